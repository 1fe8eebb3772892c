import type { GuideTree } from './types.js';

export const HOSTING_CLOUD = 'cloud';
export const HOSTING_HOME_OFFICE = 'home/office';

type NoHandshakeNode = 'hosting' | 'cloud' | 'home-office' | 'double-nat' | 'chained-forwarding';

export const NO_HANDSHAKE_TREE: GuideTree<NoHandshakeNode> = {
  id: 'no-handshake',
  title: 'Interactive No-Handshake Guide',
  intro: 'A handshake failure is usually caused by a networking or firewall issue.',
  start: 'hosting',
  nodes: {
    hosting: {
      type: 'choice',
      prompt: 'First, where is your tunnel server hosted?',
      choices: [
        { answer: HOSTING_CLOUD, next: 'cloud' },
        { answer: HOSTING_HOME_OFFICE, next: 'home-office' }
      ],
      defaultAnswer: HOSTING_CLOUD
    },
    cloud: { type: 'text', block: 'cloud-firewall', next: null },
    'home-office': { type: 'text', block: 'port-forwarding', next: 'double-nat' },
    'double-nat': {
      type: 'confirm',
      prompt:
        'Are you using a second router inside your network (e.g. a mesh system connected to your ISP\'s modem)?',
      defaultAnswer: false,
      yes: 'chained-forwarding',
      no: null
    },
    'chained-forwarding': { type: 'text', block: 'double-nat', next: null }
  }
};

type PostHandshakeNode = 'dns' | 'dns-missing' | 'server-forwarding' | 'mtu';

export const POST_HANDSHAKE_TREE: GuideTree<PostHandshakeNode> = {
  id: 'post-handshake',
  title: 'Interactive Post-Handshake Guide',
  start: 'dns',
  nodes: {
    dns: { type: 'probe', probe: 'dns', pass: 'server-forwarding', fail: 'dns-missing' },
    'dns-missing': { type: 'text', block: 'dns-missing', next: null },
    'server-forwarding': { type: 'text', block: 'server-forwarding', next: 'mtu' },
    mtu: { type: 'text', block: 'mtu-testing', next: null }
  }
};

