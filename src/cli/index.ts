#!/usr/bin/env node

/**
 * ThreatScope CLI: explore MITRE ATT&CK threat actors, tools and techniques
 *
 * Usage:
 *   threatscope                      interactive menu (same as `explore`)
 *   threatscope actors               browse actors by region, activity or sector
 *   threatscope tools                browse tools and the actors that use them
 *   threatscope actor APT29 --format json
 *   threatscope tool Mimikatz
 *   threatscope update
 *   threatscope info
 */

import 'dotenv/config';

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv);
