/**
 * Settings
 *
 * Editor configuration keyed by dotted names, in the same shape as the
 * settings.jsonc file.
 */

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.modeSwitchRequiresAlt': boolean;
  'editor.escapeTimeout': number;
  'statusLine.foreground': string;
  'statusLine.background': string;
}

export type SettingKey = keyof EditorSettings;

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabSize': 4,
  'editor.modeSwitchRequiresAlt': false,
  'editor.escapeTimeout': 50,
  'statusLine.foreground': 'black',
  'statusLine.background': 'cyan',
};

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

function assignSetting<K extends SettingKey>(target: EditorSettings, key: K, value: EditorSettings[K]): void {
  target[key] = value;
}

export class Settings {
  private settings: EditorSettings;

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings. Undefined values are skipped.
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of Object.keys(partial)) {
      if (!isSettingKey(key)) continue;
      const value = partial[key];
      if (value === undefined) continue;
      assignSetting(this.settings, key, value);
    }
  }
}
