/**
 * Keyword classification of threat actors by geography, activity type and
 * target sector, based on the free-text intrusion-set description.
 *
 * Each dimension scans its keyword list in order and takes the first keyword
 * found anywhere in the description (case-insensitive substring match).
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import type { ActorDimension } from '../../types/threat-intel.js';
import { ConfigError, errorMessage } from '../../utils/errors.js';
import { parseYaml } from '../../utils/yaml.js';

export type ClassifierKeywords = Record<ActorDimension, string[]>;

export const DEFAULT_KEYWORDS: ClassifierKeywords = {
  geography: ['China', 'Russia', 'Iran', 'North Korea', 'USA', 'Vietnam', 'India', 'Europe'],
  activity: ['espionage', 'financial', 'theft', 'sabotage', 'ransomware', 'malware'],
  sector: ['government', 'financial', 'healthcare', 'technology', 'energy', 'military'],
};

export const FALLBACK_LABELS: Record<ActorDimension, string> = {
  geography: 'Unknown',
  activity: 'Other',
  sector: 'Other',
};

/** Geography labels keep the keyword's own spelling; the others are capitalised. */
const LABEL_STYLE: Record<ActorDimension, 'verbatim' | 'capitalize'> = {
  geography: 'verbatim',
  activity: 'capitalize',
  sector: 'capitalize',
};

export type Classification = Record<ActorDimension, string>;

export interface ActorClassifier {
  readonly keywords: ClassifierKeywords;
  classify(description: string): Classification;
  classifyDimension(description: string, dimension: ActorDimension): string;
}

export function createClassifier(overrides: Partial<ClassifierKeywords> = {}): ActorClassifier {
  const keywords: ClassifierKeywords = { ...DEFAULT_KEYWORDS, ...overrides };

  const classifyDimension = (description: string, dimension: ActorDimension): string => {
    const haystack = description.toLowerCase();
    const match = keywords[dimension].find((keyword) => haystack.includes(keyword.toLowerCase()));
    if (match === undefined) return FALLBACK_LABELS[dimension];
    return LABEL_STYLE[dimension] === 'capitalize' ? capitalize(match) : match;
  };

  return {
    keywords,
    classifyDimension,
    classify: (description) => ({
      geography: classifyDimension(description, 'geography'),
      activity: classifyDimension(description, 'activity'),
      sector: classifyDimension(description, 'sector'),
    }),
  };
}

/** First letter upper-case, the rest lower-case ("NORTH korea" -> "North korea"). */
export function capitalize(word: string): string {
  if (word.length === 0) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

// ---------------------------------------------------------------------------
// Keyword overrides from YAML
// ---------------------------------------------------------------------------

const KeywordListSchema = z.array(z.string().trim().min(1)).min(1);

export const ClassifierFileSchema = z
  .object({
    geography: KeywordListSchema.optional(),
    activity: KeywordListSchema.optional(),
    sector: KeywordListSchema.optional(),
  })
  .strict();

export function parseClassifierYaml(content: string, origin = 'classifier file'): Partial<ClassifierKeywords> {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${origin}: ${errorMessage(err)}`, 'classifier');
  }

  const result = ClassifierFileSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`Invalid ${origin} at ${path}: ${issue.message}`, 'classifier');
  }

  const overrides: Partial<ClassifierKeywords> = {};
  for (const dimension of ['geography', 'activity', 'sector'] as const) {
    const list = result.data[dimension];
    if (list) overrides[dimension] = list;
  }
  return overrides;
}

/**
 * Build a classifier, applying keyword overrides from `path` when given.
 */
export async function loadClassifier(path?: string): Promise<ActorClassifier> {
  if (!path) return createClassifier();

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not read classifier file ${path}: ${errorMessage(err)}`, 'classifier');
  }
  return createClassifier(parseClassifierYaml(content, path));
}
