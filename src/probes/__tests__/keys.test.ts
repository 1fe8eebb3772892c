import { describe, it, expect } from 'vitest';
import { derivePublicKey, findInterfaceForPeer, matchInterfaceInDump } from '../keys.js';
import type { DoctorError } from '../../errors.js';
import {
  CLIENT_PRIVATE_KEY,
  CLIENT_PUBLIC_KEY,
  SERVER_PUBLIC_KEY,
  scriptedRunner
} from '../../doctor/__tests__/fakes.js';

const DUMP = [
  'wg0\tiface-private=\tiface-public=\t51820\toff',
  `wg0\tother-peer=\t(none)\t198.51.100.7:51820\t10.8.0.3/32\t1700000000\t100\t200\toff`,
  'wg1\tiface1-private=\tiface1-public=\t51821\toff',
  `wg1\t${SERVER_PUBLIC_KEY}\t(none)\t203.0.113.10:51820\t0.0.0.0/0\t1700000000\t100\t200\t25`
].join('\n');

describe('derivePublicKey', () => {
  it('feeds the private key on stdin and trims the output', async () => {
    const { runner, calls } = scriptedRunner({
      'wg pubkey': { kind: 'ok', stdout: `  ${CLIENT_PUBLIC_KEY}\n` }
    });

    const result = await derivePublicKey(runner, 'wg', CLIENT_PRIVATE_KEY);

    expect(calls).toEqual([{ bin: 'wg', args: ['pubkey'], options: { input: CLIENT_PRIVATE_KEY } }]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.publicKey).toBe(CLIENT_PUBLIC_KEY);
    }
    expect(result.outcome).toEqual({
      description: 'Deriving public key from private key',
      succeeded: true,
      message: 'Public key derived successfully.'
    });
  });

  it('fails with the tool error text on a non-zero exit', async () => {
    const { runner } = scriptedRunner({
      'wg pubkey': {
        kind: 'non_zero_exit',
        exitCode: 1,
        stderr: 'Key is not the correct length or format',
        message: 'Command failed with exit code 1: wg pubkey'
      }
    });

    const result = await derivePublicKey(runner, 'wg', 'garbage');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('tool_invocation_failure');
      expect(result.error.message).toBe(
        'Failed to derive public key. Error: Command failed with exit code 1: wg pubkey: Key is not the correct length or format'
      );
    }
    expect(result.outcome.succeeded).toBe(false);
  });

  it('fails when the helper is missing', async () => {
    const { runner } = scriptedRunner({});

    const result = await derivePublicKey(runner, 'wg', CLIENT_PRIVATE_KEY);

    expect(result.ok).toBe(false);
    expect(result.outcome.message).toBe('Failed to derive public key. Error: spawn wg ENOENT');
  });
});

describe('matchInterfaceInDump', () => {
  it('returns the interface of the matching peer record', () => {
    expect(matchInterfaceInDump(DUMP, SERVER_PUBLIC_KEY)).toBe('wg1');
  });

  it('returns null when no peer matches', () => {
    expect(matchInterfaceInDump(DUMP, 'unknown-peer=')).toBeNull();
  });

  it('ignores records with four fields or fewer', () => {
    expect(matchInterfaceInDump(`wg2\t${SERVER_PUBLIC_KEY}\tx\ty`, SERVER_PUBLIC_KEY)).toBeNull();
  });
});

describe('findInterfaceForPeer', () => {
  it('queries the dump with the timeout', async () => {
    const { runner, calls } = scriptedRunner({ 'wg show all dump': { kind: 'ok', stdout: DUMP } });

    expect(await findInterfaceForPeer(runner, 'wg', SERVER_PUBLIC_KEY, 10_000)).toBe('wg1');
    expect(calls[0]).toEqual({ bin: 'wg', args: ['show', 'all', 'dump'], options: { timeoutMs: 10_000 } });
  });

  it('returns null on timeout and reports a bad state', async () => {
    const { runner } = scriptedRunner({
      'wg show all dump': { kind: 'timed_out', message: 'Command timed out after 10000 milliseconds' }
    });
    const failures: DoctorError[] = [];

    expect(await findInterfaceForPeer(runner, 'wg', SERVER_PUBLIC_KEY, 10_000, (e) => failures.push(e))).toBeNull();
    expect(failures.map((e) => [e.code, e.message])).toEqual([
      ['timeout', 'Interface lookup timed out; the tunnel state may be in a bad state.']
    ]);
  });

  it('returns null when wg is unavailable', async () => {
    const { runner } = scriptedRunner({});
    const failures: DoctorError[] = [];

    expect(await findInterfaceForPeer(runner, 'wg', SERVER_PUBLIC_KEY, 10_000, (e) => failures.push(e))).toBeNull();
    expect(failures.map((e) => e.code)).toEqual(['missing_tool']);
  });

  it('stays silent on a plain miss', async () => {
    const { runner } = scriptedRunner({ 'wg show all dump': { kind: 'ok', stdout: DUMP } });
    const failures: DoctorError[] = [];

    expect(await findInterfaceForPeer(runner, 'wg', 'unknown-peer=', 10_000, (e) => failures.push(e))).toBeNull();
    expect(failures).toEqual([]);
  });
});
