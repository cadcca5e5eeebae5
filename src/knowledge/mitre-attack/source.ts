/**
 * Fetches the MITRE ATT&CK Enterprise STIX bundle and keeps a copy on disk.
 *
 * The raw download is cached as-is; every read (network or cache) goes
 * through the same JSON decode + schema validation.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { AttackSourceConfig } from '../../types/config.js';
import { AttackDataError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { HttpError, parseRetryAfter, withRetry, type RetryOptions } from '../../utils/retry.js';
import { parseStixBundle, type StixBundle } from './bundle-schema.js';

const log = createLogger('attack-source');

export type BundleOrigin = 'cache' | 'network';

export interface LoadedBundle {
  bundle: StixBundle;
  origin: BundleOrigin;
  /** Cache file the bundle was read from or written to. */
  cachePath: string;
}

export interface SourceOptions extends AttackSourceConfig {
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve the bundle from the cache or the network according to the
 * offline/refresh flags.
 */
export async function loadAttackBundle(options: SourceOptions): Promise<LoadedBundle> {
  const { cachePath } = options;

  if (!options.refresh) {
    const cached = await readCachedBundle(cachePath);
    if (cached) {
      log.debug(`Loaded ${cached.objects.length} STIX objects from cache ${cachePath}`);
      return { bundle: cached, origin: 'cache', cachePath };
    }
    if (options.offline) {
      throw new AttackDataError(
        `No cached ATT&CK data at ${cachePath} (offline mode). Run "threatscope update" first.`,
      );
    }
  }

  try {
    const { bundle, raw } = await downloadAttackBundle(options.url, options);
    await saveCache(cachePath, raw);
    return { bundle, origin: 'network', cachePath };
  } catch (err) {
    if (!options.refresh) throw err;

    // A refresh that fails still leaves a usable cache behind.
    const cached = await readCachedBundle(cachePath);
    if (!cached) throw err;
    log.warn(`Refresh failed (${errorMessage(err)}); using cached data from ${cachePath}`);
    return { bundle: cached, origin: 'cache', cachePath };
  }
}

/**
 * Download and validate the bundle. Retries on 429/5xx and network errors.
 */
export async function downloadAttackBundle(
  url: string,
  options: Pick<SourceOptions, 'timeoutMs' | 'fetchImpl' | 'retry'>,
): Promise<{ bundle: StixBundle; raw: string }> {
  const fetchImpl = options.fetchImpl ?? fetch;

  log.info(`Downloading ATT&CK bundle from ${url}`);

  let raw: string;
  try {
    raw = await withRetry(async () => {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
      if (!response.ok) {
        throw new HttpError(
          url,
          response.status,
          response.statusText,
          parseRetryAfter(response.headers.get('retry-after')),
        );
      }
      return response.text();
    }, {
      ...options.retry,
      onRetry: (error, attempt, delayMs) => {
        log.warn(`Download attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`);
        options.retry?.onRetry?.(error, attempt, delayMs);
      },
    });
  } catch (err) {
    throw new AttackDataError(`Could not download ATT&CK data: ${errorMessage(err)}`, { cause: err });
  }

  const bundle = decodeBundle(raw, url);
  log.info(`Downloaded bundle with ${bundle.objects.length} STIX objects`);
  return { bundle, raw };
}

/**
 * Read the cached bundle. Returns undefined when no cache file exists;
 * a cache that exists but cannot be decoded is an error.
 */
export async function readCachedBundle(cachePath: string): Promise<StixBundle | undefined> {
  let raw: string;
  try {
    raw = await readFile(cachePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw new AttackDataError(`Could not read cached ATT&CK data at ${cachePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return decodeBundle(raw, cachePath);
}

export async function writeBundleCache(cachePath: string, raw: string): Promise<void> {
  try {
    await mkdir(dirname(cachePath), { recursive: true });
    await writeFile(cachePath, raw, 'utf-8');
  } catch (err) {
    throw new AttackDataError(`Could not write ATT&CK cache to ${cachePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * JSON-decode and validate a raw bundle. `origin` names the URL or file in
 * error messages.
 */
export function decodeBundle(raw: string, origin: string): StixBundle {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new AttackDataError(`ATT&CK data from ${origin} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const result = parseStixBundle(value);
  if (!result.success) {
    throw new AttackDataError(`ATT&CK data from ${origin} is not a STIX bundle: ${result.error}`);
  }
  return result.bundle;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function saveCache(cachePath: string, raw: string): Promise<void> {
  try {
    await writeBundleCache(cachePath, raw);
    log.debug(`Cached ATT&CK bundle at ${cachePath}`);
  } catch (err) {
    log.warn(errorMessage(err));
  }
}
