import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { checkTools, findExecutable, missingPingMessage, missingWgMessage } from '../environment.js';

function finderFor(present: string[]): (name: string) => string | null {
  return (name) => (present.includes(name) ? `/usr/bin/${name}` : null);
}

describe('checkTools', () => {
  it('passes when both tools are present', () => {
    const result = checkTools({ wgBin: 'wg', pingBin: 'ping', platform: 'linux', find: finderFor(['wg', 'ping']) });

    expect(result.ok).toBe(true);
    expect(result.missing).toEqual([]);
    expect(result.outcome).toEqual({
      description: 'Verifying tool availability',
      succeeded: true,
      message: 'Required tools are available.'
    });
  });

  it('fails with OS-specific text when wg is missing', () => {
    const result = checkTools({ wgBin: 'wg', pingBin: 'ping', platform: 'darwin', find: finderFor(['ping']) });

    expect(result.ok).toBe(false);
    expect(result.missing).toEqual(['wg']);
    expect(result.outcome.message).toBe('`wg` command not found. Install it with Homebrew: `brew install wireguard-tools`.');
  });

  it('fails when ping is missing', () => {
    const result = checkTools({ wgBin: 'wg', pingBin: 'ping', platform: 'linux', find: finderFor(['wg']) });

    expect(result.ok).toBe(false);
    expect(result.missing).toEqual(['ping']);
    expect(result.outcome.message).toBe(missingPingMessage('ping', 'linux'));
  });
});

describe('missingWgMessage', () => {
  it('has distinct text per platform', () => {
    const messages = new Set(
      (['linux', 'darwin', 'win32', 'freebsd'] as const).map((platform) => missingWgMessage('wg', platform))
    );
    expect(messages.size).toBe(4);
  });

  it('falls back to a generic hint on unknown platforms', () => {
    expect(missingWgMessage('wg', 'aix')).toBe('`wg` command not found. Is WireGuard installed and in your PATH?');
  });
});

describe.skipIf(process.platform === 'win32')('findExecutable', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'find-exec-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('finds an executable file on the search path', () => {
    const bin = path.join(tmpDir, 'wg');
    fs.writeFileSync(bin, '#!/bin/sh\n', 'utf-8');
    fs.chmodSync(bin, 0o755);

    expect(findExecutable('wg', { platform: 'linux', searchPath: `/nonexistent:${tmpDir}` })).toBe(bin);
  });

  it('skips files without the execute bit', () => {
    const bin = path.join(tmpDir, 'wg');
    fs.writeFileSync(bin, '#!/bin/sh\n', 'utf-8');
    fs.chmodSync(bin, 0o644);

    expect(findExecutable('wg', { platform: 'linux', searchPath: tmpDir })).toBeNull();
  });

  it('returns null when nothing matches', () => {
    expect(findExecutable('wg', { platform: 'linux', searchPath: tmpDir })).toBeNull();
  });
});
