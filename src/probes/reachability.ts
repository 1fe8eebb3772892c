import type { CommandRunner } from '../exec/run-command.js';
import type { ReachabilityResult } from '../doctor/types.js';

export const ICMP_CAVEAT = 'Note: Some servers disable ping (ICMP). This may not be a fatal error.';

/**
 * Arguments for a single echo request. Windows ping counts with -n.
 */
export function pingArgs(host: string, platform: NodeJS.Platform): string[] {
  const countFlag = platform === 'win32' ? '-n' : '-c';
  return [countFlag, '1', host];
}

/**
 * Send one echo request to `host`. Failure is advisory only.
 */
export async function pingHost(
  runner: CommandRunner,
  pingBin: string,
  host: string,
  platform: NodeJS.Platform,
  timeoutMs: number
): Promise<ReachabilityResult> {
  const description = `Pinging server endpoint: ${host}`;
  const outcome = await runner(pingBin, pingArgs(host, platform), { timeoutMs });

  switch (outcome.kind) {
    case 'ok':
      return {
        reachable: true,
        failure: null,
        outcome: { description, succeeded: true, message: `Endpoint ${host} is reachable.` },
        notes: []
      };
    case 'non_zero_exit':
      return {
        reachable: false,
        failure: 'network_unreachable',
        outcome: { description, succeeded: false, message: `Endpoint ${host} is not reachable via ping.` },
        notes: [ICMP_CAVEAT]
      };
    case 'timed_out':
      return {
        reachable: false,
        failure: 'timeout',
        outcome: {
          description,
          succeeded: false,
          message: `Ping to ${host} timed out after ${Math.round(timeoutMs / 1000)}s; the network path may be in a bad state.`
        },
        notes: [ICMP_CAVEAT]
      };
    case 'tool_missing':
      return {
        reachable: false,
        failure: 'missing_tool',
        outcome: { description, succeeded: false, message: `\`${pingBin}\` command not found.` },
        notes: []
      };
  }
}
