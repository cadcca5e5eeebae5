/**
 * Loads everything a command needs before it can talk to the user: the
 * ATT&CK knowledge base (behind a spinner) and the actor classifier.
 */

import chalk from 'chalk';
import ora from 'ora';

import { loadClassifier, type ActorClassifier } from '../knowledge/mitre-attack/classifier.js';
import { AttackKnowledgeBase } from '../knowledge/mitre-attack/loader.js';
import type { ThreatScopeConfig } from '../types/config.js';
import { AttackDataError, errorMessage } from '../utils/errors.js';

export const LOAD_FAILED = 'Failed to load attack STIX content.';

export interface CommandContext {
  config: ThreatScopeConfig;
  kb: AttackKnowledgeBase;
  classifier: ActorClassifier;
}

export async function loadKnowledgeBase(config: ThreatScopeConfig): Promise<AttackKnowledgeBase> {
  const spinner = ora('Loading MITRE ATT&CK content...').start();
  try {
    const kb = await AttackKnowledgeBase.load(config.attack);
    spinner.succeed(
      `Loaded MITRE ATT&CK ${kb.metadata.version} (${kb.origin === 'network' ? 'downloaded' : 'cached'})`,
    );
    return kb;
  } catch (err) {
    spinner.fail(chalk.bold.red(`Error fetching MITRE ATT&CK content: ${errorMessage(err)}`));
    console.error(chalk.bold.red(LOAD_FAILED));
    throw new AttackDataError(LOAD_FAILED, { cause: err, reported: true });
  }
}

export async function loadCommandContext(config: ThreatScopeConfig): Promise<CommandContext> {
  const classifier = await loadClassifier(config.classifierFile);
  const kb = await loadKnowledgeBase(config);
  return { config, kb, classifier };
}
