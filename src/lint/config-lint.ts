import { ROUTE_ALL_IPV4, type TunnelConfig } from '../config/schema.js';

export type LintRule = 'dns_leak' | 'missing_keepalive';

export interface LintWarning {
  rule: LintRule;
  message: string;
}

function routesAllTraffic(allowedIPs: string): boolean {
  return allowedIPs
    .split(',')
    .map((range) => range.trim())
    .includes(ROUTE_ALL_IPV4);
}

/**
 * Best-practice checks on a parsed config. Each rule is independent and
 * advisory.
 */
export function lintConfig(config: TunnelConfig): LintWarning[] {
  const warnings: LintWarning[] = [];

  if (routesAllTraffic(config.allowedIPs) && !config.dns) {
    warnings.push({
      rule: 'dns_leak',
      message:
        "AllowedIPs routes all traffic (0.0.0.0/0) but no DNS server is set in [Interface]. " +
        'DNS queries may leak outside the tunnel or fail once it is up. Add e.g. `DNS = 1.1.1.1`.'
    });
  }

  if (config.persistentKeepalive === undefined) {
    warnings.push({
      rule: 'missing_keepalive',
      message:
        'PersistentKeepalive is not set in [Peer]. Behind NAT the tunnel can go quiet and drop; ' +
        'consider `PersistentKeepalive = 25`.'
    });
  }

  return warnings;
}
