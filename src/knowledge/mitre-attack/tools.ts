/**
 * Tool queries: the techniques a tool implements and the actors known to
 * use it.
 */

import type { CorrelatedActor, Tool, ToolTechnique } from '../../types/threat-intel.js';
import type { StixObject } from './bundle-schema.js';
import { compareCodeUnits, joinKillChainPhases, joinPlatforms } from './actors.js';
import { getAttackId, STIX_TYPES, type AttackKnowledgeBase } from './loader.js';

export const NO_DESCRIPTION = 'No description available';

/**
 * Every tool, in bundle order.
 */
export function loadTools(kb: AttackKnowledgeBase): Tool[] {
  return kb.objectsOfType(STIX_TYPES.tool).map((obj) => {
    const attackId = getAttackId(obj);
    return {
      id: obj.id,
      ...(attackId !== undefined ? { attackId } : {}),
      name: obj.name ?? obj.id,
      description: obj.description ?? NO_DESCRIPTION,
    };
  });
}

/**
 * Case-insensitive lookup of a tool by name.
 */
export function findTool(kb: AttackKnowledgeBase, name: string): Tool | undefined {
  const wanted = name.toLowerCase();
  return loadTools(kb).find((tool) => tool.name.toLowerCase() === wanted);
}

/**
 * Techniques related from the tool, sorted by kill chain (stable, so
 * techniques sharing a kill chain keep relationship order).
 */
export function getTechniquesForTool(kb: AttackKnowledgeBase, toolId: string): ToolTechnique[] {
  const techniques: ToolTechnique[] = [];

  for (const rel of kb.relationshipsFrom(toolId)) {
    const targetRef = rel.target_ref;
    if (!targetRef || !targetRef.includes(STIX_TYPES.technique)) continue;

    const technique = kb.getObject(targetRef);
    if (!technique || technique.type !== STIX_TYPES.technique) continue;

    techniques.push({
      killChain: joinKillChainPhases(technique),
      name: technique.name ?? technique.id,
      platform: joinPlatforms(technique),
      description: flattenDescription(technique),
    });
  }

  return techniques.sort((a, b) => compareCodeUnits(a.killChain, b.killChain));
}

/**
 * Intrusion-sets with a relationship pointing at the tool, in relationship
 * order.
 */
export function getActorsForTool(kb: AttackKnowledgeBase, toolId: string): CorrelatedActor[] {
  const actors: CorrelatedActor[] = [];

  for (const rel of kb.relationshipsTo(toolId)) {
    const sourceRef = rel.source_ref;
    if (!sourceRef || !sourceRef.includes(STIX_TYPES.actor)) continue;

    const actor = kb.getObject(sourceRef);
    if (!actor || actor.type !== STIX_TYPES.actor) continue;

    actors.push({
      name: actor.name ?? actor.id,
      description: flattenDescription(actor),
    });
  }

  return actors;
}

/** Description on one line, suffixed with the object's STIX id. */
export function flattenDescription(obj: StixObject): string {
  const description = (obj.description ?? NO_DESCRIPTION).replace(/\n/g, ' ');
  return `${description} (ID: ${obj.id})`;
}
