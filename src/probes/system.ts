import type { DoctorSettings } from '../config/schema.js';
import type { DoctorProbes } from '../doctor/types.js';
import { runCommand, type CommandRunner } from '../exec/run-command.js';
import { checkDNS, systemResolver, type HostResolver } from './dns.js';
import { checkTools, systemExecutableFinder, type ExecutableFinder } from './environment.js';
import { checkHandshake, nowUnixSeconds } from './handshake.js';
import { derivePublicKey, findInterfaceForPeer } from './keys.js';
import { pingHost } from './reachability.js';

export interface SystemProbeOptions {
  runner?: CommandRunner;
  resolver?: HostResolver;
  find?: ExecutableFinder;
  platform?: NodeJS.Platform;
  now?: () => number;
}

/**
 * Bind every probe to the host's tools and the configured settings.
 */
export function createSystemProbes(settings: DoctorSettings, options: SystemProbeOptions = {}): DoctorProbes {
  const runner = options.runner ?? runCommand;
  const resolver = options.resolver ?? systemResolver;
  const find = options.find ?? systemExecutableFinder();
  const platform = options.platform ?? process.platform;
  const now = options.now ?? nowUnixSeconds;
  const { wg, ping } = settings.tools;
  const timeoutMs = settings.command_timeout_ms;

  return {
    checkTools: async () => checkTools({ wgBin: wg, pingBin: ping, platform, find }),
    derivePublicKey: (privateKey) => derivePublicKey(runner, wg, privateKey),
    findInterfaceForPeer: (serverPublicKey, onFailure) =>
      findInterfaceForPeer(runner, wg, serverPublicKey, timeoutMs, onFailure),
    pingHost: (host) => pingHost(runner, ping, host, platform, timeoutMs),
    checkHandshake: (interfaceName) => checkHandshake(runner, wg, interfaceName, timeoutMs, now),
    checkDNS: () => checkDNS(resolver, settings.dns_hosts)
  };
}
