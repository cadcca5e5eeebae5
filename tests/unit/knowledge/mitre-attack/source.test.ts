/**
 * Tests for downloading and caching the ATT&CK bundle.
 *
 * fetch is replaced by a stub; the cache lives in a temporary directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  decodeBundle,
  downloadAttackBundle,
  loadAttackBundle,
  readCachedBundle,
  type SourceOptions,
} from '@/knowledge/mitre-attack/source.js';
import { AttackDataError } from '@/utils/errors.js';
import { buildAttackBundle } from '../../../fixtures/attack-bundle.js';

const ATTACK_URL = 'https://attack.example.com/enterprise-attack.json';
const RAW = JSON.stringify(buildAttackBundle());

let dir: string;
let cachePath: string;

function okResponse(body: string = RAW): Response {
  return new Response(body, { status: 200 });
}

function errorResponse(status: number, statusText: string): Response {
  return new Response('', { status, statusText });
}

function sourceOptions(fetchImpl: typeof fetch, overrides: Partial<SourceOptions> = {}): SourceOptions {
  return {
    url: ATTACK_URL,
    cachePath,
    timeoutMs: 5000,
    offline: false,
    refresh: false,
    fetchImpl,
    retry: { initialDelayMs: 1, maxDelayMs: 1 },
    ...overrides,
  };
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'threatscope-source-'));
  cachePath = join(dir, 'nested', 'enterprise-attack.json');
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('loadAttackBundle', () => {
  it('should download and cache the bundle when no cache exists', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());

    const loaded = await loadAttackBundle(sourceOptions(fetchImpl));

    expect(loaded.origin).toBe('network');
    expect(loaded.bundle.objects).toHaveLength(buildAttackBundle().objects.length);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(ATTACK_URL);
    expect(await readFile(cachePath, 'utf-8')).toBe(RAW);
  });

  it('should use the cache without touching the network', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());
    await loadAttackBundle(sourceOptions(fetchImpl));

    const loaded = await loadAttackBundle(sourceOptions(fetchImpl));

    expect(loaded.origin).toBe('cache');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should download again on refresh', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());
    await loadAttackBundle(sourceOptions(fetchImpl));

    const loaded = await loadAttackBundle(sourceOptions(fetchImpl, { refresh: true }));

    expect(loaded.origin).toBe('network');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should fall back to the cache when a refresh fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());
    await loadAttackBundle(sourceOptions(fetchImpl));

    fetchImpl.mockImplementation(async () => errorResponse(404, 'Not Found'));
    const loaded = await loadAttackBundle(sourceOptions(fetchImpl, { refresh: true }));

    expect(loaded.origin).toBe('cache');
    expect(console.warn).toHaveBeenCalled();
  });

  it('should fail a refresh with no cache to fall back on', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => errorResponse(404, 'Not Found'));

    await expect(loadAttackBundle(sourceOptions(fetchImpl, { refresh: true }))).rejects.toThrow(
      `Could not download ATT&CK data: HTTP 404 Not Found for ${ATTACK_URL}`,
    );
  });

  it('should refuse to download in offline mode', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());

    await expect(loadAttackBundle(sourceOptions(fetchImpl, { offline: true }))).rejects.toThrow(
      /offline mode/,
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should read an existing cache in offline mode', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse());
    await loadAttackBundle(sourceOptions(fetchImpl));

    const loaded = await loadAttackBundle(sourceOptions(fetchImpl, { offline: true }));
    expect(loaded.origin).toBe('cache');
  });
});

describe('downloadAttackBundle', () => {
  it('should retry a 503 response', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(errorResponse(503, 'Service Unavailable'))
      .mockResolvedValueOnce(okResponse());

    const { bundle, raw } = await downloadAttackBundle(ATTACK_URL, {
      timeoutMs: 5000,
      fetchImpl,
      retry: { initialDelayMs: 1, maxDelayMs: 1 },
    });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(raw).toBe(RAW);
    expect(bundle.id).toBe('bundle--test');
  });

  it('should wrap network failures in AttackDataError', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const pending = downloadAttackBundle(ATTACK_URL, {
      timeoutMs: 5000,
      fetchImpl,
      retry: { maxRetries: 1, initialDelayMs: 1, maxDelayMs: 1 },
    });

    await expect(pending).rejects.toBeInstanceOf(AttackDataError);
    await expect(pending).rejects.toThrow('Could not download ATT&CK data: fetch failed');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should reject a response that is not a STIX bundle', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => okResponse('{"type":"collection"}'));

    await expect(downloadAttackBundle(ATTACK_URL, { timeoutMs: 5000, fetchImpl })).rejects.toThrow(
      `ATT&CK data from ${ATTACK_URL} is not a STIX bundle`,
    );
  });
});

describe('readCachedBundle', () => {
  it('should return undefined when the file does not exist', async () => {
    expect(await readCachedBundle(join(dir, 'missing.json'))).toBeUndefined();
  });

  it('should reject a corrupt cache file', async () => {
    const path = join(dir, 'corrupt.json');
    await writeFile(path, '{"type": "bundle", ', 'utf-8');

    await expect(readCachedBundle(path)).rejects.toThrow(`ATT&CK data from ${path} is not valid JSON`);
  });
});

describe('decodeBundle', () => {
  it('should name the origin and the schema problem', () => {
    expect(() => decodeBundle('{"type":"bundle","objects":[]}', 'test.json')).toThrow(
      'ATT&CK data from test.json is not a STIX bundle: id: Required',
    );
  });
});
