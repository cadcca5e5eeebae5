/**
 * Indexed, in-memory view of the ATT&CK STIX bundle, exposed as a singleton
 * so that repeated loads of the same source share one parse.
 */

import type { DatasetMetadata } from '../../types/threat-intel.js';
import type { StixBundle, StixObject } from './bundle-schema.js';
import { loadAttackBundle, type BundleOrigin, type SourceOptions } from './source.js';

export const STIX_TYPES = {
  actor: 'intrusion-set',
  tool: 'tool',
  technique: 'attack-pattern',
  relationship: 'relationship',
  collection: 'x-mitre-collection',
} as const;

export interface KnowledgeBaseOptions {
  /** Keep revoked and deprecated objects visible to queries. */
  includeDeprecated?: boolean;
}

// ---------------------------------------------------------------------------
// AttackKnowledgeBase
// ---------------------------------------------------------------------------

export class AttackKnowledgeBase {
  private static instance: AttackKnowledgeBase | null = null;
  private static loadedKey: string | null = null;

  public readonly bundle: StixBundle;
  public readonly origin: BundleOrigin | 'memory';

  private readonly objects: StixObject[];
  private readonly byId = new Map<string, StixObject>();
  private readonly bySource = new Map<string, StixObject[]>();
  private readonly byTarget = new Map<string, StixObject[]>();

  private constructor(bundle: StixBundle, origin: BundleOrigin | 'memory', options: KnowledgeBaseOptions) {
    this.bundle = bundle;
    this.origin = origin;
    this.objects = options.includeDeprecated
      ? bundle.objects
      : bundle.objects.filter((obj) => isActive(obj));

    for (const obj of this.objects) {
      if (obj.type === STIX_TYPES.relationship) {
        if (obj.source_ref) pushIndexed(this.bySource, obj.source_ref, obj);
        if (obj.target_ref) pushIndexed(this.byTarget, obj.target_ref, obj);
      } else {
        this.byId.set(obj.id, obj);
      }
    }
  }

  /**
   * Load the knowledge base from the configured source. Returns the cached
   * singleton when called again with the same URL and cache path, unless a
   * refresh is requested.
   */
  static async load(
    source: SourceOptions,
    options: KnowledgeBaseOptions = {},
  ): Promise<AttackKnowledgeBase> {
    const key = `${source.url}|${source.cachePath}|${options.includeDeprecated ? 'all' : 'active'}`;

    if (
      AttackKnowledgeBase.instance &&
      AttackKnowledgeBase.loadedKey === key &&
      !source.refresh
    ) {
      return AttackKnowledgeBase.instance;
    }

    const { bundle, origin } = await loadAttackBundle(source);
    const kb = new AttackKnowledgeBase(bundle, origin, options);
    AttackKnowledgeBase.instance = kb;
    AttackKnowledgeBase.loadedKey = key;
    return kb;
  }

  /**
   * Create a knowledge base from an in-memory bundle (useful for tests).
   */
  static fromBundle(bundle: StixBundle, options: KnowledgeBaseOptions = {}): AttackKnowledgeBase {
    const kb = new AttackKnowledgeBase(bundle, 'memory', options);
    AttackKnowledgeBase.instance = kb;
    AttackKnowledgeBase.loadedKey = null;
    return kb;
  }

  /**
   * Reset the singleton (primarily for tests).
   */
  static reset(): void {
    AttackKnowledgeBase.instance = null;
    AttackKnowledgeBase.loadedKey = null;
  }

  // -----------------------------------------------------------------------
  // Lookups
  // -----------------------------------------------------------------------

  getObject(id: string): StixObject | undefined {
    return this.byId.get(id);
  }

  /** Objects of one STIX type, in bundle order. */
  objectsOfType(type: string): StixObject[] {
    return this.objects.filter((obj) => obj.type === type);
  }

  /** Relationships whose `source_ref` is `id`, in bundle order. */
  relationshipsFrom(id: string): StixObject[] {
    return this.bySource.get(id) ?? [];
  }

  /** Relationships whose `target_ref` is `id`, in bundle order. */
  relationshipsTo(id: string): StixObject[] {
    return this.byTarget.get(id) ?? [];
  }

  get metadata(): DatasetMetadata {
    let lastModified = '';
    const counts = new Map<string, number>();

    for (const obj of this.objects) {
      if (obj.modified && obj.modified > lastModified) {
        lastModified = obj.modified;
      }
      counts.set(obj.type, (counts.get(obj.type) ?? 0) + 1);
    }

    const collection = this.bundle.objects.find((o) => o.type === STIX_TYPES.collection);

    return {
      version: collection?.x_mitre_version ?? 'unknown',
      lastModified,
      objectCount: this.objects.length,
      actorCount: counts.get(STIX_TYPES.actor) ?? 0,
      toolCount: counts.get(STIX_TYPES.tool) ?? 0,
      techniqueCount: counts.get(STIX_TYPES.technique) ?? 0,
      relationshipCount: counts.get(STIX_TYPES.relationship) ?? 0,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isActive(obj: StixObject): boolean {
  return obj.revoked !== true && obj.x_mitre_deprecated !== true;
}

/** ATT&CK external id (e.g. "G0016", "T1059.001") of a STIX object. */
export function getAttackId(obj: StixObject): string | undefined {
  return obj.external_references?.find((ref) => ref.source_name === 'mitre-attack')?.external_id;
}

function pushIndexed(index: Map<string, StixObject[]>, key: string, obj: StixObject): void {
  const list = index.get(key);
  if (list) {
    list.push(obj);
  } else {
    index.set(key, [obj]);
  }
}
