/**
 * Configuration types for ThreatScope.
 */

import type { LogLevel } from '../utils/logger.js';

export interface ThreatScopeConfig {
  attack: AttackSourceConfig;
  display: DisplayConfig;
  classifierFile?: string;
  logging: LogConfig;
}

export interface AttackSourceConfig {
  url: string;
  cachePath: string;
  timeoutMs: number;
  offline: boolean;              // never download, cache only
  refresh: boolean;              // download even when a cache exists
}

export interface DisplayConfig {
  pageSize: number;              // techniques per pager page
}

export interface LogConfig {
  level: LogLevel;
}
