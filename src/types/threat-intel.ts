/**
 * Domain views over the ATT&CK STIX bundle.
 */

export type ActorDimension = 'geography' | 'activity' | 'sector';

export interface ThreatActor {
  id: string;                    // STIX id, e.g. "intrusion-set--..."
  attackId?: string;             // e.g. "G0016"
  name: string;                  // e.g. "APT29"
  aliases: string[];
  geography: string;             // e.g. "Russia", "Unknown"
  activity: string;              // e.g. "Espionage", "Other"
  sector: string;                // e.g. "Government", "Other"
}

/** A technique as listed for a threat actor. */
export interface ActorTechnique {
  id: string;
  attackId?: string;             // e.g. "T1059.001"
  name: string;
  description: string;
  platforms: string;             // comma-joined, "N/A" when absent
  killChainPhases: string;       // comma-joined phase names
}

export interface Tool {
  id: string;
  attackId?: string;             // e.g. "S0002"
  name: string;
  description: string;
}

/** A technique as listed in a tool panel. */
export interface ToolTechnique {
  killChain: string;
  name: string;
  platform: string;
  description: string;           // flattened, suffixed with the STIX id
}

export interface CorrelatedActor {
  name: string;
  description: string;           // flattened, suffixed with the STIX id
}

export interface DatasetMetadata {
  version: string;
  lastModified: string;
  objectCount: number;
  actorCount: number;
  toolCount: number;
  techniqueCount: number;
  relationshipCount: number;
}
