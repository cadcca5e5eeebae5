/**
 * Unit tests for tool queries.
 *
 * Tests: loadTools, findTool, getTechniquesForTool, getActorsForTool
 */

import { describe, it, expect } from 'vitest';
import {
  findTool,
  flattenDescription,
  getActorsForTool,
  getTechniquesForTool,
  loadTools,
  NO_DESCRIPTION,
} from '@/knowledge/mitre-attack/tools.js';
import { ACTOR_DESCRIPTIONS, createTestKnowledgeBase, IDS } from '../../../fixtures/attack-bundle.js';

const kb = createTestKnowledgeBase();

describe('loadTools', () => {
  it('should list tools in bundle order', () => {
    expect(loadTools(kb).map((tool) => tool.name)).toEqual(['Mimikatz', 'PsExec', 'ngrok']);
  });

  it('should default a missing description', () => {
    const ngrok = loadTools(kb).find((tool) => tool.id === IDS.ngrok);
    expect(ngrok?.description).toBe(NO_DESCRIPTION);
    expect(ngrok?.attackId).toBeUndefined();
  });
});

describe('findTool', () => {
  it('should match names case-insensitively', () => {
    expect(findTool(kb, 'MIMIKATZ')?.id).toBe(IDS.mimikatz);
    expect(findTool(kb, 'nmap')).toBeUndefined();
  });
});

describe('getTechniquesForTool', () => {
  it('should sort techniques by kill chain', () => {
    expect(getTechniquesForTool(kb, IDS.mimikatz)).toEqual([
      {
        killChain: 'credential-access',
        name: 'OS Credential Dumping',
        platform: 'Windows, Linux, macOS',
        description:
          'Adversaries may dump credentials. * LSASS memory * SAM database (ID: attack-pattern--t1003)',
      },
      {
        killChain: 'lateral-movement',
        name: 'Remote Services',
        platform: 'Windows',
        description:
          'Adversaries may use valid accounts to log into remote services. (ID: attack-pattern--t1021)',
      },
    ]);
  });

  it('should describe techniques that have no description', () => {
    const execution = getTechniquesForTool(kb, IDS.psexec)[0];
    expect(execution.killChain).toBe('execution');
    expect(execution.description).toBe('No description available (ID: attack-pattern--t1059)');
  });

  it('should return nothing for a tool without techniques', () => {
    expect(getTechniquesForTool(kb, IDS.ngrok)).toEqual([]);
  });
});

describe('getActorsForTool', () => {
  it('should list the active actors using the tool', () => {
    expect(getActorsForTool(kb, IDS.mimikatz)).toEqual([
      {
        name: 'APT29',
        description: `${ACTOR_DESCRIPTIONS.apt29.replace('\n', ' ')} (ID: ${IDS.apt29})`,
      },
      {
        name: 'APT1',
        description: `${ACTOR_DESCRIPTIONS.apt1} (ID: ${IDS.apt1})`,
      },
    ]);
  });

  it('should return nothing for an unused tool', () => {
    expect(getActorsForTool(kb, IDS.ngrok)).toEqual([]);
  });
});

describe('flattenDescription', () => {
  it('should put the description on one line and append the id', () => {
    expect(flattenDescription({ type: 'tool', id: 'tool--x', description: 'a\nb\nc' })).toBe(
      'a b c (ID: tool--x)',
    );
  });
});
