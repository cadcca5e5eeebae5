/**
 * Builds the runtime configuration from environment variables (populated
 * from `.env` by the CLI entry point) and command-line overrides.
 */

import { resolve } from 'node:path';
import { z } from 'zod';

import type { ThreatScopeConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_ATTACK_URL =
  'https://raw.githubusercontent.com/mitre/cti/master/enterprise-attack/enterprise-attack.json';

export const DEFAULT_CACHE_RELATIVE_PATH = 'data/mitre-attack/enterprise-attack.json';

export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_PAGE_SIZE = 5;

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  THREATSCOPE_ATTACK_URL: z.string().url().optional(),
  THREATSCOPE_CACHE_PATH: z.string().optional(),
  THREATSCOPE_TIMEOUT_MS: positiveInt.optional(),
  THREATSCOPE_PAGE_SIZE: positiveInt.optional(),
  THREATSCOPE_CLASSIFIER_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/** Values coming from command-line flags; they win over the environment. */
export interface ConfigOverrides {
  url?: string;
  cache?: string;
  offline?: boolean;
  refresh?: boolean;
  pageSize?: string | number;
  classifier?: string;
  verbose?: boolean;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): ThreatScopeConfig {
  const parsedEnv = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsedEnv.success) {
    const issue = parsedEnv.error.issues[0];
    const key = String(issue.path[0]);
    throw new ConfigError(`Invalid value for ${key}: ${issue.message}`, key);
  }
  const vars = parsedEnv.data;

  const url = overrides.url ?? vars.THREATSCOPE_ATTACK_URL ?? DEFAULT_ATTACK_URL;
  if (overrides.url !== undefined && !z.string().url().safeParse(overrides.url).success) {
    throw new ConfigError(`Invalid value for --url: "${overrides.url}" is not a URL`, 'url');
  }

  let pageSize = vars.THREATSCOPE_PAGE_SIZE ?? DEFAULT_PAGE_SIZE;
  if (overrides.pageSize !== undefined) {
    const parsed = positiveInt.safeParse(overrides.pageSize);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid value for --page-size: "${overrides.pageSize}" must be a positive integer`,
        'pageSize',
      );
    }
    pageSize = parsed.data;
  }

  if (overrides.offline && overrides.refresh) {
    throw new ConfigError('--offline and --refresh cannot be used together', 'offline');
  }

  const classifierFile = overrides.classifier ?? vars.THREATSCOPE_CLASSIFIER_FILE;

  return {
    attack: {
      url,
      cachePath: resolve(cwd, overrides.cache ?? vars.THREATSCOPE_CACHE_PATH ?? DEFAULT_CACHE_RELATIVE_PATH),
      timeoutMs: vars.THREATSCOPE_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
      offline: overrides.offline ?? false,
      refresh: overrides.refresh ?? false,
    },
    display: { pageSize },
    ...(classifierFile !== undefined ? { classifierFile: resolve(cwd, classifierFile) } : {}),
    logging: {
      level: overrides.verbose ? 'debug' : vars.LOG_LEVEL ?? 'warn',
    },
  };
}

function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}
