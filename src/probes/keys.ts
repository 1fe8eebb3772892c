import { DoctorError } from '../errors.js';
import type { CommandOutcome, CommandRunner } from '../exec/run-command.js';
import type { KeyDerivation } from '../doctor/types.js';

/** Peer records in `wg show all dump` have more fields than this */
const MIN_PEER_FIELDS = 4;

/**
 * Derive the public key for `privateKey` with `wg pubkey`.
 * Runs without a timeout: it is a short local computation.
 */
export async function derivePublicKey(
  runner: CommandRunner,
  wgBin: string,
  privateKey: string
): Promise<KeyDerivation> {
  const description = 'Deriving public key from private key';
  const outcome = await runner(wgBin, ['pubkey'], { input: privateKey });

  if (outcome.kind === 'ok') {
    return {
      ok: true,
      publicKey: outcome.stdout.trim(),
      outcome: { description, succeeded: true, message: 'Public key derived successfully.' }
    };
  }

  const detail =
    outcome.kind === 'non_zero_exit' && outcome.stderr
      ? `${outcome.message}: ${outcome.stderr}`
      : outcome.message;
  const message = `Failed to derive public key. Error: ${detail}`;
  return {
    ok: false,
    error: new DoctorError('tool_invocation_failure', message),
    outcome: { description, succeeded: false, message }
  };
}

/**
 * Pick the interface whose peer list contains `serverPublicKey` out of a
 * `wg show all dump` listing. First match wins.
 */
export function matchInterfaceInDump(dump: string, serverPublicKey: string): string | null {
  for (const line of dump.split('\n')) {
    const fields = line.replace(/\r$/, '').split('\t');
    if (fields.length > MIN_PEER_FIELDS && fields[1] === serverPublicKey) {
      return fields[0];
    }
  }
  return null;
}

function lookupFailure(outcome: Exclude<CommandOutcome, { kind: 'ok' }>, wgBin: string): DoctorError {
  switch (outcome.kind) {
    case 'timed_out':
      return new DoctorError('timeout', 'Interface lookup timed out; the tunnel state may be in a bad state.');
    case 'tool_missing':
      return new DoctorError('missing_tool', `Interface lookup failed: \`${wgBin}\` is not available.`);
    case 'non_zero_exit':
      return new DoctorError('tool_invocation_failure', `Interface lookup failed: ${outcome.message}`);
  }
}

/**
 * Find the live interface that has `serverPublicKey` as a peer.
 * A failed query yields null like a miss, and is also handed to `onFailure`.
 */
export async function findInterfaceForPeer(
  runner: CommandRunner,
  wgBin: string,
  serverPublicKey: string,
  timeoutMs: number,
  onFailure?: (error: DoctorError) => void
): Promise<string | null> {
  const outcome = await runner(wgBin, ['show', 'all', 'dump'], { timeoutMs });
  if (outcome.kind !== 'ok') {
    onFailure?.(lookupFailure(outcome, wgBin));
    return null;
  }
  return matchInterfaceInDump(outcome.stdout, serverPublicKey);
}
