import { describe, it, expect } from 'vitest';
import { checkDNS, type HostResolver } from '../dns.js';

const HOSTS = ['one.one.one.one', 'google.com'] as const;

function resolverFailingOn(failing: string[], seen: string[]): HostResolver {
  return async (hostname) => {
    seen.push(hostname);
    if (failing.includes(hostname)) {
      throw new Error(`getaddrinfo ENOTFOUND ${hostname}`);
    }
    return { address: '192.0.2.1', family: 4 };
  };
}

describe('checkDNS', () => {
  it('passes when both hosts resolve', async () => {
    const seen: string[] = [];
    const result = await checkDNS(resolverFailingOn([], seen), HOSTS);

    expect(seen).toEqual(['one.one.one.one', 'google.com']);
    expect(result).toEqual({
      ok: true,
      outcome: { description: 'Checking DNS resolution', succeeded: true, message: 'DNS resolution is working correctly.' }
    });
  });

  it('fails when the first host does not resolve', async () => {
    const seen: string[] = [];
    const result = await checkDNS(resolverFailingOn(['one.one.one.one'], seen), HOSTS);

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.failure).toBe('resolution_failure');
    expect(seen).toEqual(['one.one.one.one']);
    expect(result.outcome.message).toBe(
      "DNS resolution failed for one.one.one.one (getaddrinfo ENOTFOUND one.one.one.one). This is likely the cause of the 'no internet' issue."
    );
  });

  it('fails when only the second host does not resolve', async () => {
    const seen: string[] = [];
    const result = await checkDNS(resolverFailingOn(['google.com'], seen), HOSTS);

    expect(result.ok).toBe(false);
    expect(seen).toEqual(['one.one.one.one', 'google.com']);
  });
});
