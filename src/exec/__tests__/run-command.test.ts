import { describe, it, expect } from 'vitest';
import { runCommand, withCommandLog, type CommandRunner } from '../run-command.js';

const NODE = process.execPath;

describe('runCommand', () => {
  it('returns stdout on success', async () => {
    const outcome = await runCommand(NODE, ['-e', 'process.stdout.write("hello\\n")']);

    expect(outcome).toEqual({ kind: 'ok', stdout: 'hello' });
  });

  it('feeds input on stdin', async () => {
    const outcome = await runCommand(
      NODE,
      ['-e', 'let s="";process.stdin.on("data",(d)=>s+=d).on("end",()=>process.stdout.write(s.toUpperCase()))'],
      { input: 'abc' }
    );

    expect(outcome).toEqual({ kind: 'ok', stdout: 'ABC' });
  });

  it('reports a non-zero exit with stderr', async () => {
    const outcome = await runCommand(NODE, ['-e', 'process.stderr.write("bad key\\n"); process.exit(3)']);

    expect(outcome.kind).toBe('non_zero_exit');
    if (outcome.kind === 'non_zero_exit') {
      expect(outcome.exitCode).toBe(3);
      expect(outcome.stderr).toBe('bad key');
    }
  });

  it('reports a missing executable', async () => {
    const outcome = await runCommand('tunnel-doctor-no-such-binary', ['--version']);

    expect(outcome.kind).toBe('tool_missing');
  });

  it('reports a timeout', async () => {
    const outcome = await runCommand(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

    expect(outcome.kind).toBe('timed_out');
  });
});

describe('withCommandLog', () => {
  it('logs the command line and the outcome kind', async () => {
    const lines: string[] = [];
    const inner: CommandRunner = async () => ({ kind: 'ok', stdout: '' });

    await withCommandLog(inner, (line) => lines.push(line))('wg', ['show', 'wg0', 'latest-handshakes']);

    expect(lines).toEqual(['$ wg show wg0 latest-handshakes', '  -> ok']);
  });
});
