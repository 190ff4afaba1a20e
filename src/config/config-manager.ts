/**
 * Config Manager
 *
 * Loads settings from ~/.vee/settings.jsonc and <workspace>/.vee/settings.jsonc.
 * Workspace values override user values; both override the defaults.
 * Files are optional and loading never throws: anything unreadable or
 * invalid is logged and skipped.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { debugLog } from '../debug.ts';
import { Settings, isSettingKey, type EditorSettings, type SettingKey } from './settings.ts';

// ============================================
// Configuration
// ============================================

export const CONFIG_DIR_NAME = '.vee';
export const SETTINGS_FILE_NAME = 'settings.jsonc';

/**
 * Config paths for different locations.
 */
export interface ConfigPaths {
  /** User settings file (~/.vee/settings.jsonc) - supports comments */
  userSettings: string;
  /** Workspace settings file (<project>/.vee/settings.jsonc) - supports comments */
  workspaceSettings: string | null;
}

export interface ConfigManagerOptions {
  homeDirectory?: string;
  workingDirectory?: string;
}

// ============================================
// Parsing
// ============================================

/**
 * Remove // and /* *\/ comments outside of string literals.
 */
export function stripJsonComments(content: string): string {
  let result = '';
  let inString = false;
  let i = 0;

  while (i < content.length) {
    const char = content[i]!;
    const next = content[i + 1];

    if (inString) {
      result += char;
      if (char === '\\' && next !== undefined) {
        result += next;
        i += 2;
        continue;
      }
      if (char === '"') inString = false;
      i++;
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
      i++;
    } else if (char === '/' && next === '/') {
      while (i < content.length && content[i] !== '\n') i++;
    } else if (char === '/' && next === '*') {
      const end = content.indexOf('*/', i + 2);
      i = end === -1 ? content.length : end + 2;
    } else {
      result += char;
      i++;
    }
  }

  return result;
}

/**
 * Check a raw value against the type and range of a setting.
 */
function isValidValue(key: SettingKey, value: unknown): boolean {
  switch (key) {
    case 'editor.tabSize':
      return typeof value === 'number' && Number.isInteger(value) && value >= 1;
    case 'editor.escapeTimeout':
      return typeof value === 'number' && Number.isFinite(value) && value >= 0;
    case 'editor.modeSwitchRequiresAlt':
      return typeof value === 'boolean';
    case 'statusLine.foreground':
    case 'statusLine.background':
      return typeof value === 'string' && value.length > 0;
  }
}

/**
 * Keep the known, well-typed entries of a parsed settings object.
 */
export function validateSettings(raw: unknown, source: string): Partial<EditorSettings> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    debugLog(`[ConfigManager] Ignoring ${source}: expected an object`);
    return {};
  }

  const result: Partial<EditorSettings> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingKey(key)) {
      debugLog(`[ConfigManager] Unknown setting '${key}' in ${source}`);
      continue;
    }
    if (!isValidValue(key, value)) {
      debugLog(`[ConfigManager] Invalid value for '${key}' in ${source}: ${JSON.stringify(value)}`);
      continue;
    }
    Object.assign(result, { [key]: value });
  }
  return result;
}

// ============================================
// Config Manager
// ============================================

export class ConfigManager {
  /** Config paths */
  private paths: ConfigPaths;

  /** Loaded settings */
  private settings: Settings;

  /** Whether config has been loaded */
  private loaded = false;

  constructor(options: ConfigManagerOptions = {}) {
    const home = options.homeDirectory ?? process.env.HOME ?? process.env.USERPROFILE ?? '';
    const workingDirectory = options.workingDirectory;

    this.paths = {
      userSettings: path.join(home, CONFIG_DIR_NAME, SETTINGS_FILE_NAME),
      workspaceSettings: workingDirectory
        ? path.join(workingDirectory, CONFIG_DIR_NAME, SETTINGS_FILE_NAME)
        : null,
    };
    this.settings = new Settings();
  }

  /**
   * Load user then workspace settings.
   */
  async load(): Promise<Settings> {
    if (this.loaded) return this.settings;

    const userSettings = await this.loadSettingsFile(this.paths.userSettings);
    this.settings.update(userSettings);

    if (this.paths.workspaceSettings) {
      const workspaceSettings = await this.loadSettingsFile(this.paths.workspaceSettings);
      this.settings.update(workspaceSettings);
    }

    this.loaded = true;
    debugLog(`[ConfigManager] Configuration loaded: ${JSON.stringify(this.settings.getAll())}`);
    return this.settings;
  }

  getPaths(): ConfigPaths {
    return { ...this.paths };
  }

  /**
   * Load a settings file with comment support.
   */
  private async loadSettingsFile(file: string): Promise<Partial<EditorSettings>> {
    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        debugLog(`[ConfigManager] File does not exist: ${file}`);
      } else {
        debugLog(`[ConfigManager] Error reading ${file}: ${error}`);
      }
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(stripJsonComments(content));
      const settings = validateSettings(parsed, file);
      debugLog(`[ConfigManager] Loaded ${Object.keys(settings).length} settings from ${file}`);
      return settings;
    } catch (error) {
      debugLog(`[ConfigManager] Error parsing ${file}: ${error}`);
      return {};
    }
  }
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
