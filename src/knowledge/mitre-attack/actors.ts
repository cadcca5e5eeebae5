/**
 * Threat-actor (intrusion-set) queries over an AttackKnowledgeBase.
 */

import type { ActorTechnique, ThreatActor } from '../../types/threat-intel.js';
import type { StixObject } from './bundle-schema.js';
import type { ActorClassifier } from './classifier.js';
import { getAttackId, STIX_TYPES, type AttackKnowledgeBase } from './loader.js';

/**
 * Every named intrusion-set, classified and sorted by name.
 */
export function getAllThreatActors(kb: AttackKnowledgeBase, classifier: ActorClassifier): ThreatActor[] {
  const actors: ThreatActor[] = [];

  for (const obj of kb.objectsOfType(STIX_TYPES.actor)) {
    if (!obj.name) continue;

    const attackId = getAttackId(obj);
    actors.push({
      id: obj.id,
      ...(attackId !== undefined ? { attackId } : {}),
      name: obj.name,
      aliases: (obj.aliases ?? []).filter((alias) => alias !== obj.name),
      ...classifier.classify(obj.description ?? ''),
    });
  }

  return actors.sort((a, b) => compareCodeUnits(a.name, b.name));
}

/**
 * STIX id of the intrusion-set named `name` (case-insensitive). Falls back
 * to matching aliases when no primary name matches.
 */
export function getActorId(kb: AttackKnowledgeBase, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const actors = kb.objectsOfType(STIX_TYPES.actor);

  const byName = actors.find((obj) => obj.name?.toLowerCase() === wanted);
  if (byName) return byName.id;

  return actors.find((obj) => obj.aliases?.some((alias) => alias.toLowerCase() === wanted))?.id;
}

/**
 * Techniques the actor is related to, in relationship order. A technique
 * reached through several relationships is listed once.
 */
export function getTechniquesForActor(kb: AttackKnowledgeBase, actorId: string): ActorTechnique[] {
  const techniques: ActorTechnique[] = [];
  const seen = new Set<string>();

  for (const rel of kb.relationshipsFrom(actorId)) {
    const targetRef = rel.target_ref;
    if (!targetRef || !targetRef.includes(STIX_TYPES.technique) || seen.has(targetRef)) continue;

    const technique = kb.getObject(targetRef);
    if (!technique || technique.type !== STIX_TYPES.technique) continue;

    seen.add(targetRef);
    techniques.push(toActorTechnique(technique));
  }

  return techniques;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function joinPlatforms(obj: StixObject): string {
  return (obj.x_mitre_platforms ?? ['N/A']).join(', ');
}

export function joinKillChainPhases(obj: StixObject): string {
  return (obj.kill_chain_phases ?? []).map((phase) => phase.phase_name).join(', ');
}

function toActorTechnique(obj: StixObject): ActorTechnique {
  const attackId = getAttackId(obj);
  return {
    id: obj.id,
    ...(attackId !== undefined ? { attackId } : {}),
    name: obj.name ?? obj.id,
    description: obj.description ?? 'N/A',
    platforms: joinPlatforms(obj),
    killChainPhases: joinKillChainPhases(obj),
  };
}

/** Plain code-unit ordering, independent of the runtime locale. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
