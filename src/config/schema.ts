import { z } from 'zod';

/** Default AllowedIPs when a [Peer] section omits it: route everything. */
export const ROUTE_ALL_IPV4 = '0.0.0.0/0';

/** Hostnames resolved by the DNS probe. */
export const DEFAULT_DNS_HOSTS = ['one.one.one.one', 'google.com'] as const;

/**
 * Structured view of a tunnel .conf file.
 * Field names follow the [Interface]/[Peer] keys they come from.
 */
export const tunnelConfigSchema = z.object({
  clientPrivateKey: z.string().min(1, 'PrivateKey is empty'),
  serverPublicKey: z.string().min(1, 'PublicKey is empty'),
  endpointHost: z.string().min(1, 'Endpoint host is empty'),
  endpointPort: z.number().int().min(1).max(65535),
  address: z.string().optional(),
  dns: z.string().optional(),
  allowedIPs: z.string().default(ROUTE_ALL_IPV4),
  persistentKeepalive: z.number().int().nonnegative().optional()
});

export type TunnelConfig = Readonly<z.infer<typeof tunnelConfigSchema>>;

const toolsSchema = z.object({
  /** Key derivation and tunnel state helper */
  wg: z.string().default('wg'),
  /** Single-echo reachability probe */
  ping: z.string().default('ping')
});

export const doctorSettingsSchema = z.object({
  tools: toolsSchema.default({}),
  /** Bound applied to every external query except key derivation */
  command_timeout_ms: z.number().int().positive().default(10_000),
  dns_hosts: z.tuple([z.string().min(1), z.string().min(1)]).default([...DEFAULT_DNS_HOSTS])
});

export type DoctorSettings = z.infer<typeof doctorSettingsSchema>;
