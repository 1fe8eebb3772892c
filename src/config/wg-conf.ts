/**
 * Tunnel configuration reader.
 *
 * Reads the INI-style .conf format used by wg-quick: `[Interface]` and
 * `[Peer]` sections of `Key = Value` lines. Only the fields the doctor
 * needs are extracted; everything else is ignored.
 */

import fs from 'node:fs';
import { DoctorError } from '../errors.js';
import { TunnelConfig, tunnelConfigSchema } from './schema.js';

type Section = Map<string, string>;

/**
 * Split a .conf document into sections, keyed by section name then by
 * lower-cased key. Only the first of repeated sections is kept.
 * Keys are case-insensitive; a repeated key within one section is joined
 * with ", " the way wg-quick accumulates Address/DNS/AllowedIPs lines.
 */
export function parseConfSections(text: string): Map<string, Section> {
  const sections = new Map<string, Section>();
  let current: Section | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const header = line.match(/^\[([^\]]+)\]$/);
    if (header) {
      const name = header[1].trim();
      current = new Map();
      // Later duplicates are read but discarded
      if (!sections.has(name)) {
        sections.set(name, current);
      }
      continue;
    }

    const eq = line.indexOf('=');
    if (eq === -1) {
      throw new DoctorError('config_parse_failure', `Line ${i + 1} is not a 'Key = Value' pair: '${line}'`);
    }
    if (current === null) {
      throw new DoctorError('config_parse_failure', `Line ${i + 1} appears before any [Section] header`);
    }

    const key = line.slice(0, eq).trim().toLowerCase();
    const value = line.slice(eq + 1).trim();
    const existing = current.get(key);
    current.set(key, existing === undefined ? value : `${existing}, ${value}`);
  }

  return sections;
}

/**
 * Split `host:port` at the last colon. `[v6]:port` loses its brackets.
 */
export function splitEndpoint(endpoint: string): { host: string; port: number } {
  const idx = endpoint.lastIndexOf(':');
  const invalid = new DoctorError(
    'config_parse_failure',
    `Invalid endpoint format in config file: '${endpoint}'. It should be 'host:port'.`
  );
  if (idx <= 0) {
    throw invalid;
  }
  let host = endpoint.slice(0, idx);
  const portText = endpoint.slice(idx + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  if (!/^\d+$/.test(portText) || host === '') {
    throw invalid;
  }
  return { host, port: Number.parseInt(portText, 10) };
}

function requireKey(sections: Map<string, Section>, section: string, key: string): string {
  const values = sections.get(section);
  if (!values) {
    throw new DoctorError(
      'config_parse_failure',
      `Invalid or incomplete configuration file. Missing section: [${section}]`
    );
  }
  const value = values.get(key.toLowerCase());
  if (value === undefined) {
    throw new DoctorError(
      'config_parse_failure',
      `Invalid or incomplete configuration file. Missing key '${key}' in [${section}]`
    );
  }
  return value;
}

function optionalKey(sections: Map<string, Section>, section: string, key: string): string | undefined {
  return sections.get(section)?.get(key.toLowerCase());
}

export function parseTunnelConfig(text: string): TunnelConfig {
  const sections = parseConfSections(text);

  const privateKey = requireKey(sections, 'Interface', 'PrivateKey');
  const publicKey = requireKey(sections, 'Peer', 'PublicKey');
  const { host, port } = splitEndpoint(requireKey(sections, 'Peer', 'Endpoint'));

  const keepaliveText = optionalKey(sections, 'Peer', 'PersistentKeepalive');
  let persistentKeepalive: number | undefined;
  if (keepaliveText !== undefined && keepaliveText !== 'off') {
    if (!/^\d+$/.test(keepaliveText)) {
      throw new DoctorError(
        'config_parse_failure',
        `Invalid PersistentKeepalive value: '${keepaliveText}'. It should be a number of seconds.`
      );
    }
    persistentKeepalive = Number.parseInt(keepaliveText, 10);
  }

  const result = tunnelConfigSchema.safeParse({
    clientPrivateKey: privateKey,
    serverPublicKey: publicKey,
    endpointHost: host,
    endpointPort: port,
    address: optionalKey(sections, 'Interface', 'Address'),
    dns: optionalKey(sections, 'Interface', 'DNS'),
    allowedIPs: optionalKey(sections, 'Peer', 'AllowedIPs'),
    persistentKeepalive
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new DoctorError('config_parse_failure', `Invalid configuration file. ${details}`, {
      cause: result.error
    });
  }
  return result.data;
}

/**
 * Read and parse a tunnel .conf file.
 * @throws DoctorError with code `config_parse_failure`
 */
export function loadTunnelConfig(configPath: string): TunnelConfig {
  if (!fs.existsSync(configPath)) {
    throw new DoctorError('config_parse_failure', `Configuration file not found at '${configPath}'`);
  }
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new DoctorError(
      'config_parse_failure',
      `Could not read configuration file '${configPath}': ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return parseTunnelConfig(text);
}
