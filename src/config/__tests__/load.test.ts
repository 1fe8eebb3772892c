import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadSettings, resolveSettingsPath, SETTINGS_FILENAME } from '../load.js';

describe('settings', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('uses defaults when no settings file exists', () => {
    const settingsPath = resolveSettingsPath(tmpDir);

    expect(settingsPath).toBeNull();
    expect(loadSettings(settingsPath)).toEqual({
      tools: { wg: 'wg', ping: 'ping' },
      command_timeout_ms: 10_000,
      dns_hosts: ['one.one.one.one', 'google.com']
    });
  });

  it('picks up the default file in the working directory', () => {
    const file = path.join(tmpDir, SETTINGS_FILENAME);
    fs.writeFileSync(file, JSON.stringify({ tools: { wg: '/opt/wg/bin/wg' } }), 'utf-8');

    const settingsPath = resolveSettingsPath(tmpDir);

    expect(settingsPath).toBe(file);
    expect(loadSettings(settingsPath).tools).toEqual({ wg: '/opt/wg/bin/wg', ping: 'ping' });
  });

  it('prefers an explicit path', () => {
    const file = path.join(tmpDir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify({ command_timeout_ms: 2500 }), 'utf-8');

    const settings = loadSettings(resolveSettingsPath('/elsewhere', file));

    expect(settings.command_timeout_ms).toBe(2500);
  });

  it('throws for an explicit path that does not exist', () => {
    const file = path.join(tmpDir, 'nope.json');

    expect(() => loadSettings(file)).toThrow(`Settings not found: ${file}`);
  });

  it('rejects invalid values', () => {
    const file = path.join(tmpDir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ command_timeout_ms: -1 }), 'utf-8');

    expect(() => loadSettings(file)).toThrow();
  });
});
