/**
 * Machine-readable reports for the non-interactive lookups
 * (`threatscope actor <name>` and `threatscope tool <name>`).
 */

import type {
  ActorTechnique,
  CorrelatedActor,
  DatasetMetadata,
  ThreatActor,
  Tool,
  ToolTechnique,
} from '../types/threat-intel.js';
import { serializeYaml } from '../utils/yaml.js';

export type ReportFormat = 'json' | 'yaml';

interface ReportMetadata {
  generatedAt: string;
  attackVersion: string;
}

export interface ActorReport {
  metadata: ReportMetadata;
  actor: ThreatActor;
  techniqueCount: number;
  techniques: ActorTechnique[];
}

export interface ToolReport {
  metadata: ReportMetadata;
  tool: Tool;
  techniques: ToolTechnique[];
  actors: CorrelatedActor[];
}

export function buildActorReport(
  actor: ThreatActor,
  techniques: ActorTechnique[],
  dataset: DatasetMetadata,
  generatedAt: Date = new Date(),
): ActorReport {
  return {
    metadata: { generatedAt: generatedAt.toISOString(), attackVersion: dataset.version },
    actor,
    techniqueCount: techniques.length,
    techniques,
  };
}

export function buildToolReport(
  tool: Tool,
  techniques: ToolTechnique[],
  actors: CorrelatedActor[],
  dataset: DatasetMetadata,
  generatedAt: Date = new Date(),
): ToolReport {
  return {
    metadata: { generatedAt: generatedAt.toISOString(), attackVersion: dataset.version },
    tool,
    techniques,
    actors,
  };
}

/**
 * Serialize a report. JSON is pretty-printed with 2-space indentation.
 */
export function serializeReport(report: ActorReport | ToolReport, format: ReportFormat): string {
  return format === 'yaml' ? serializeYaml(report) : JSON.stringify(report, null, 2);
}
