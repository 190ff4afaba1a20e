import { describe, test, expect } from 'vitest';
import { Settings, defaultSettings, isSettingKey } from '../../../src/config/settings.ts';

describe('Settings', () => {
  test('starts from defaults merged with overrides', () => {
    const settings = new Settings({ 'editor.tabSize': 2 });
    expect(settings.get('editor.tabSize')).toBe(2);
    expect(settings.get('statusLine.background')).toBe(defaultSettings['statusLine.background']);
  });

  test('update applies defined values and skips undefined ones', () => {
    const settings = new Settings();

    settings.update({ 'editor.tabSize': 3, 'statusLine.foreground': 'white', 'editor.escapeTimeout': undefined });

    expect(settings.get('editor.tabSize')).toBe(3);
    expect(settings.get('statusLine.foreground')).toBe('white');
    expect(settings.get('editor.escapeTimeout')).toBe(50);
  });

  test('later updates win', () => {
    const settings = new Settings();
    settings.update({ 'editor.tabSize': 8, 'editor.modeSwitchRequiresAlt': true });
    settings.update({ 'editor.tabSize': 2 });

    expect(settings.getAll()).toEqual({
      ...defaultSettings,
      'editor.tabSize': 2,
      'editor.modeSwitchRequiresAlt': true,
    });
  });

  test('getAll returns a copy', () => {
    const settings = new Settings();
    const all = settings.getAll();
    all['editor.tabSize'] = 99;
    expect(settings.get('editor.tabSize')).toBe(4);
  });
});

describe('isSettingKey', () => {
  test('accepts known keys only', () => {
    expect(isSettingKey('editor.tabSize')).toBe(true);
    expect(isSettingKey('editor.fontSize')).toBe(false);
    expect(isSettingKey('toString')).toBe(false);
  });
});
