/**
 * Zod schemas for the subset of a STIX 2.x bundle that ThreatScope reads.
 *
 * Unknown properties are stripped on parse, which keeps the in-memory
 * bundle much smaller than the raw ATT&CK download.
 */

import { z } from 'zod';

export const ExternalReferenceSchema = z.object({
  source_name: z.string().optional(),
  external_id: z.string().optional(),
  url: z.string().optional(),
});

export const KillChainPhaseSchema = z.object({
  kill_chain_name: z.string(),
  phase_name: z.string(),
});

export const StixObjectSchema = z.object({
  type: z.string(),
  id: z.string(),
  name: z.string().optional(),
  description: z.string().optional(),
  aliases: z.array(z.string()).optional(),
  created: z.string().optional(),
  modified: z.string().optional(),
  revoked: z.boolean().optional(),
  external_references: z.array(ExternalReferenceSchema).optional(),
  kill_chain_phases: z.array(KillChainPhaseSchema).optional(),
  x_mitre_platforms: z.array(z.string()).optional(),
  x_mitre_deprecated: z.boolean().optional(),
  x_mitre_is_subtechnique: z.boolean().optional(),
  x_mitre_version: z.string().optional(),
  relationship_type: z.string().optional(),
  source_ref: z.string().optional(),
  target_ref: z.string().optional(),
});

export const StixBundleSchema = z.object({
  type: z.literal('bundle'),
  id: z.string(),
  spec_version: z.string().optional(),
  objects: z.array(StixObjectSchema),
});

export type ExternalReference = z.infer<typeof ExternalReferenceSchema>;
export type KillChainPhase = z.infer<typeof KillChainPhaseSchema>;
export type StixObject = z.infer<typeof StixObjectSchema>;
export type StixBundle = z.infer<typeof StixBundleSchema>;

export type BundleParseResult =
  | { success: true; bundle: StixBundle }
  | { success: false; error: string };

/**
 * Validate an already JSON-decoded value as a STIX bundle.
 */
export function parseStixBundle(value: unknown): BundleParseResult {
  const result = StixBundleSchema.safeParse(value);
  if (result.success) {
    return { success: true, bundle: result.data };
  }

  const issue = result.error.issues[0];
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return { success: false, error: `${path}: ${issue.message}` };
}
