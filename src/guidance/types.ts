/**
 * Guidance tree model.
 *
 * A tree is a table of nodes keyed by id. Every edge points forward, so a
 * walk visits each node at most once and always terminates.
 */

export type BlockId =
  | 'cloud-firewall'
  | 'port-forwarding'
  | 'double-nat'
  | 'dns-missing'
  | 'server-forwarding'
  | 'mtu-testing';

export type ProbeId = 'dns';

export type GuideNode<N extends string> =
  | { type: 'text'; block: BlockId; next: N | null }
  | {
      type: 'choice';
      prompt: string;
      choices: readonly { answer: string; next: N }[];
      defaultAnswer: string;
    }
  | { type: 'confirm'; prompt: string; defaultAnswer: boolean; yes: N | null; no: N | null }
  | { type: 'probe'; probe: ProbeId; pass: N; fail: N };

export interface GuideTree<N extends string = string> {
  id: 'no-handshake' | 'post-handshake';
  title: string;
  /** Shown once before the first node */
  intro?: string;
  start: N;
  nodes: Record<N, GuideNode<N>>;
}

/**
 * What a walk did, in order.
 */
export interface GuideTrace {
  tree: GuideTree['id'];
  visited: string[];
  blocks: BlockId[];
  /** Prompt answers and probe results keyed by node id */
  answers: Record<string, string | boolean>;
}
