/**
 * Handshake classifier.
 *
 * `wg show <iface> latest-handshakes` prints one `<peer key>\t<unix ts>`
 * line per peer. Only the first line is consulted: on an interface with
 * several peers the first one decides, and no attempt is made to pick the
 * peer from the config file.
 */

import type { CommandOutcome, CommandRunner } from '../exec/run-command.js';
import type {
  Classification,
  HandshakeCheck,
  HandshakeRecord,
  HandshakeVerdict,
  StepOutcome
} from '../doctor/types.js';

/** A handshake younger than this many seconds counts as fresh */
export const HANDSHAKE_FRESH_SECONDS = 180;

export const PARSE_FAILURE_REASON = 'Failed to parse handshake data.';

export function parseHandshakeLine(line: string): HandshakeRecord | null {
  const fields = line.split('\t');
  if (fields.length !== 2) {
    return null;
  }
  const [peerPublicKey, timestampText] = fields;
  if (!/^-?\d+$/.test(timestampText.trim())) {
    return null;
  }
  return { peerPublicKey, timestampUnixSeconds: Number.parseInt(timestampText, 10) };
}

/**
 * Judge raw latest-handshakes output against `nowSeconds`.
 */
export function classifyHandshakeOutput(
  output: string,
  nowSeconds: number
): { verdict: HandshakeVerdict; record: HandshakeRecord | null } {
  const data = output.trim();
  if (data === '') {
    return { verdict: { kind: 'absent' }, record: null };
  }

  const firstLine = data.split(/\r?\n/)[0];
  const record = parseHandshakeLine(firstLine);
  if (record === null) {
    return {
      verdict: { kind: 'unavailable', code: 'malformed_tool_output', reason: PARSE_FAILURE_REASON },
      record: null
    };
  }

  const age = nowSeconds - record.timestampUnixSeconds;
  if (age < HANDSHAKE_FRESH_SECONDS) {
    return { verdict: { kind: 'fresh', secondsAgo: age }, record };
  }
  return { verdict: { kind: 'stale', minutesAgo: Math.floor(age / 60) }, record };
}

export function classify(verdict: HandshakeVerdict): Classification {
  return verdict.kind === 'fresh' ? 'has_handshake' : 'no_handshake';
}

export function describeVerdict(verdict: HandshakeVerdict): string {
  switch (verdict.kind) {
    case 'fresh':
      return `Recent handshake found! (${verdict.secondsAgo} seconds ago)`;
    case 'stale':
      return `Stale handshake found. (Last handshake was ${verdict.minutesAgo} minutes ago)`;
    case 'absent':
      return 'No handshake found for any peer on this interface.';
    case 'unavailable':
      return verdict.reason;
  }
}

export function nowUnixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function verdictFromOutcome(
  outcome: CommandOutcome,
  wgBin: string,
  interfaceName: string,
  now: () => number
): { verdict: HandshakeVerdict; record: HandshakeRecord | null } {
  switch (outcome.kind) {
    case 'ok':
      return classifyHandshakeOutput(outcome.stdout, now());
    case 'non_zero_exit':
      return {
        verdict: {
          kind: 'unavailable',
          code: 'tool_invocation_failure',
          reason: `Could not get handshake status. Is interface '${interfaceName}' up?`
        },
        record: null
      };
    case 'timed_out':
      return {
        verdict: {
          kind: 'unavailable',
          code: 'timeout',
          reason: `Handshake query for '${interfaceName}' timed out; the interface may be in a bad state.`
        },
        record: null
      };
    case 'tool_missing':
      return {
        verdict: {
          kind: 'unavailable',
          code: 'missing_tool',
          reason: `Could not get handshake status: \`${wgBin}\` is not available.`
        },
        record: null
      };
  }
}

/**
 * Query and classify the latest handshake on `interfaceName`.
 * The clock is read after the query returns.
 */
export async function checkHandshake(
  runner: CommandRunner,
  wgBin: string,
  interfaceName: string,
  timeoutMs: number,
  now: () => number = nowUnixSeconds
): Promise<HandshakeCheck> {
  const description = `Checking for a handshake on interface '${interfaceName}'`;
  const outcome = await runner(wgBin, ['show', interfaceName, 'latest-handshakes'], { timeoutMs });
  const { verdict, record } = verdictFromOutcome(outcome, wgBin, interfaceName, now);

  const stepOutcome: StepOutcome = {
    description,
    succeeded: verdict.kind === 'fresh',
    message: describeVerdict(verdict)
  };
  return { verdict, record, outcome: stepOutcome };
}
