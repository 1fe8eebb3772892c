import type { TunnelConfig } from '../config/schema.js';
import type { GuidanceBlock } from '../doctor/types.js';
import type { BlockId } from './types.js';

/** Address shown in the DNS example when the config has none */
const EXAMPLE_ADDRESS = '10.0.0.2/32';

type BlockRenderer = (config: TunnelConfig) => GuidanceBlock;

export const GUIDANCE_BLOCKS: Record<BlockId, BlockRenderer> = {
  'cloud-firewall': (config) => ({
    title: 'Troubleshooting for Cloud Servers (AWS, GCP, Azure, etc.)',
    tone: 'info',
    lines: [
      `1. Security Group / Cloud Firewall: In your cloud provider's console, make sure an inbound rule allows UDP on port ${config.endpointPort} from any source (0.0.0.0/0). This is the most common cause.`,
      "2. Server's Local Firewall: SSH into the server and check its local firewall.",
      `   - ufw: run \`sudo ufw status\` and allow the port with \`sudo ufw allow ${config.endpointPort}/udp\`.`,
      '   - firewalld: run `sudo firewall-cmd --list-all` and make sure the port is in the active zone.',
      '3. Tunnel Service Status: On the server, run `sudo wg show`. Does the interface exist?',
      '   Check the service with `sudo systemctl status wg-quick@<interface_name>`.'
    ]
  }),

  'port-forwarding': (config) => ({
    title: 'Troubleshooting for Home/Office Servers',
    tone: 'info',
    lines: [
      "1. Port Forwarding: You must set up port forwarding on your internet router.",
      "   - Log in to your router's admin page.",
      "   - Find the 'Port Forwarding' or 'Virtual Server' section.",
      '   - Create a new rule:',
      `       External Port: ${config.endpointPort}`,
      `       Internal Port: ${config.endpointPort}`,
      '       Protocol: UDP',
      '       Device IP: the local IP address of your tunnel server (e.g. 192.168.1.100)'
    ]
  }),

  'double-nat': (config) => ({
    title: 'Double NAT Detected! This requires special configuration.',
    tone: 'warning',
    lines: [
      "You have a chain of routers: [Internet] -> [ISP Modem/Router] -> [Your Second Router] -> [Tunnel Server]",
      '',
      "Set up chained port forwarding:",
      `1. On your SECOND router: forward UDP ${config.endpointPort} to the tunnel server's IP.`,
      `2. On your MAIN ISP router: forward UDP ${config.endpointPort} to your second router's IP address.`
    ]
  }),

  'dns-missing': (config) => ({
    title: 'DNS Resolution Failed!',
    tone: 'error',
    lines: [
      "Your device is connected to the tunnel but can't look up hostnames.",
      '',
      'Solution:',
      '- Open your tunnel configuration file (.conf).',
      '- In the [Interface] section, make sure there is a DNS entry.',
      '- Good public resolvers are 1.1.1.1 (Cloudflare) and 8.8.8.8 (Google).',
      '',
      'Example:',
      '[Interface]',
      'PrivateKey = ...',
      `Address = ${config.address ?? EXAMPLE_ADDRESS}`,
      'DNS = 1.1.1.1'
    ]
  }),

  'server-forwarding': () => ({
    title: 'DNS is working. Your internet issue is likely on the server side.',
    tone: 'success',
    lines: [
      "The server isn't forwarding your traffic to the internet. SSH into the server and check:",
      '',
      '1. Enable IP Forwarding:',
      '   - Run `sudo sysctl net.ipv4.ip_forward`. The result should be 1.',
      "   - If it's 0, add `net.ipv4.ip_forward=1` to /etc/sysctl.conf (or a file in /etc/sysctl.d/) and run `sudo sysctl -p`.",
      '',
      '2. Firewall NAT Rule:',
      '   - Traffic from tunnel clients must be masqueraded. A common rule is:',
      '     `sudo iptables -t nat -A POSTROUTING -o <public_interface> -j MASQUERADE`',
      "   - Replace <public_interface> with the server's main network interface (e.g. eth0).",
      '   - Persist the rule across reboots, for example with the iptables-persistent package.'
    ]
  }),

  'mtu-testing': () => ({
    title: 'Check for MTU problems',
    tone: 'info',
    lines: [
      'If small pages load but large downloads or some sites hang, packets may be too large for the path.',
      'Find the largest packet that passes unfragmented, starting from 1472 bytes of payload:',
      '   - Linux:   `ping -M do -s 1472 1.1.1.1`',
      '   - macOS:   `ping -D -s 1472 1.1.1.1`',
      '   - Windows: `ping -f -l 1472 1.1.1.1`',
      "Lower the size until it succeeds. The tunnel MTU should be that size + 28 - 80 (IP, ICMP and tunnel overhead); 1432 gives 1380.",
      'Set it in the [Interface] section, e.g. `MTU = 1380`, and reconnect.'
    ]
  })
};

export function renderBlock(id: BlockId, config: TunnelConfig): GuidanceBlock {
  return GUIDANCE_BLOCKS[id](config);
}
