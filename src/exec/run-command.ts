import { execa, ExecaError } from 'execa';

export interface RunCommandOptions {
  /** Text written to the child's stdin */
  input?: string;
  /** Kill the child and report `timed_out` after this many ms */
  timeoutMs?: number;
}

/**
 * Uniform result of one external command invocation.
 */
export type CommandOutcome =
  | { kind: 'ok'; stdout: string }
  | { kind: 'tool_missing'; message: string }
  | { kind: 'non_zero_exit'; exitCode: number | null; stderr: string; message: string }
  | { kind: 'timed_out'; message: string };

export type CommandRunner = (
  bin: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandOutcome>;

/**
 * Run an external command once. Never throws for process-level failures;
 * anything that is not an execa error is rethrown.
 */
export const runCommand: CommandRunner = async (bin, args, options = {}) => {
  try {
    const result = await execa(bin, args, {
      input: options.input,
      timeout: options.timeoutMs,
      cleanup: true
    });
    return { kind: 'ok', stdout: result.stdout };
  } catch (error) {
    if (!(error instanceof ExecaError)) {
      throw error;
    }
    const failure: ExecaError = error;
    if (failure.timedOut) {
      return { kind: 'timed_out', message: failure.shortMessage };
    }
    if (failure.code === 'ENOENT') {
      return { kind: 'tool_missing', message: failure.shortMessage };
    }
    return {
      kind: 'non_zero_exit',
      exitCode: failure.exitCode ?? null,
      stderr: typeof failure.stderr === 'string' ? failure.stderr.trim() : '',
      message: failure.shortMessage
    };
  }
};

/**
 * Wrap a runner so every invocation is reported to `log`.
 */
export function withCommandLog(runner: CommandRunner, log: (line: string) => void): CommandRunner {
  return async (bin, args, options) => {
    log(`$ ${[bin, ...args].join(' ')}`);
    const outcome = await runner(bin, args, options);
    log(`  -> ${outcome.kind}`);
    return outcome;
  };
}
