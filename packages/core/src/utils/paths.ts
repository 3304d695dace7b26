/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';

export const LSPD_DIR = '.lspd';
export const USER_SETTINGS_FILE = 'settings.json';
export const PROJECT_CONFIG_FILE = 'config.json';

/**
 * Resolves a leading `~` against the given home directory.
 */
export function expandHome(target: string, homeDir = os.homedir()): string {
  if (target === '~') {
    return homeDir;
  }
  if (target.startsWith('~/')) {
    return path.join(homeDir, target.slice(2));
  }
  return target;
}

export function getUserSettingsPath(homeDir = os.homedir()): string {
  return path.join(homeDir, LSPD_DIR, USER_SETTINGS_FILE);
}

export function getProjectConfigPath(cwd = process.cwd()): string {
  return path.join(cwd, LSPD_DIR, PROJECT_CONFIG_FILE);
}
