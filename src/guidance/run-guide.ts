import type { TunnelConfig } from '../config/schema.js';
import type { DoctorProbes, Presenter, StepOutcome } from '../doctor/types.js';
import { renderBlock } from './blocks.js';
import type { GuideNode, GuideTrace, GuideTree, ProbeId } from './types.js';

export interface GuideContext {
  presenter: Presenter;
  probes: Pick<DoctorProbes, 'checkDNS'>;
  config: TunnelConfig;
  /** Receives outcomes of probes run inside the tree */
  onStep?: (outcome: StepOutcome) => void;
}

type GuideProbes = GuideContext['probes'];

const PROBES: Record<ProbeId, (probes: GuideProbes) => Promise<{ ok: boolean; outcome: StepOutcome }>> = {
  dns: (probes) => probes.checkDNS()
};

async function visit<N extends string>(
  id: N,
  node: GuideNode<N>,
  ctx: GuideContext,
  trace: GuideTrace
): Promise<N | null> {
  switch (node.type) {
    case 'text':
      ctx.presenter.reportGuidance(renderBlock(node.block, ctx.config));
      trace.blocks.push(node.block);
      return node.next;

    case 'choice': {
      const answers = node.choices.map((choice) => choice.answer);
      const answer = await ctx.presenter.askChoice(node.prompt, answers, node.defaultAnswer);
      const selected = node.choices.find((choice) => choice.answer === answer);
      if (!selected) {
        throw new Error(`Answer '${answer}' is not one of: ${answers.join(', ')}`);
      }
      trace.answers[id] = answer;
      return selected.next;
    }

    case 'confirm': {
      const yes = await ctx.presenter.askYesNo(node.prompt, node.defaultAnswer);
      trace.answers[id] = yes;
      return yes ? node.yes : node.no;
    }

    case 'probe': {
      const result = await PROBES[node.probe](ctx.probes);
      ctx.presenter.reportStep(result.outcome.description, result.outcome.succeeded, result.outcome.message);
      ctx.onStep?.(result.outcome);
      trace.answers[id] = result.ok;
      return result.ok ? node.pass : node.fail;
    }
  }
}

/**
 * Walk `tree` from its start node to a terminal node.
 * @throws Error if the table sends the walk back to a visited node
 */
export async function runGuide<N extends string>(tree: GuideTree<N>, ctx: GuideContext): Promise<GuideTrace> {
  const trace: GuideTrace = { tree: tree.id, visited: [], blocks: [], answers: {} };

  ctx.presenter.reportSection(tree.title);
  if (tree.intro) {
    ctx.presenter.reportInfo(tree.intro);
  }

  let current: N | null = tree.start;
  while (current !== null) {
    if (trace.visited.includes(current)) {
      throw new Error(`Guide '${tree.id}' revisits node '${current}'`);
    }
    trace.visited.push(current);
    current = await visit(current, tree.nodes[current], ctx, trace);
  }

  return trace;
}
