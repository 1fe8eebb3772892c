import { lookup } from 'node:dns/promises';
import type { DnsCheck } from '../doctor/types.js';

/** Resolves a hostname or rejects. */
export type HostResolver = (hostname: string) => Promise<unknown>;

export const systemResolver: HostResolver = (hostname) => lookup(hostname);

/**
 * Resolve each host in turn. The first failure fails the check.
 * No timeout beyond the resolver's own.
 */
export async function checkDNS(resolve: HostResolver, hosts: readonly string[]): Promise<DnsCheck> {
  const description = 'Checking DNS resolution';
  for (const host of hosts) {
    try {
      await resolve(host);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        failure: 'resolution_failure',
        outcome: {
          description,
          succeeded: false,
          message: `DNS resolution failed for ${host} (${reason}). This is likely the cause of the 'no internet' issue.`
        }
      };
    }
  }
  return {
    ok: true,
    outcome: { description, succeeded: true, message: 'DNS resolution is working correctly.' }
  };
}
