import type { V1NodeList, V1Pod } from '@kubernetes/client-node';
import { logger, type HostPriority, type SchedulerExtension } from '@remote-cloud/shared';
import type { PrioritizeCandidates } from './config.js';

const log = logger.child({ module: 'extender-round' });

export interface ExtenderRoundOptions {
  /**
   * `filtered` scores only the nodes that survived filter; `all` scores every
   * original candidate. Defaults to `filtered`.
   */
  prioritizeCandidates?: PrioritizeCandidates;
}

export interface ExtenderRoundResult {
  feasible: V1NodeList;
  priorities: HostPriority[];
}

/**
 * One filter-then-prioritize pass against a scheduler extension. The scores
 * are returned untouched; combining them with local scores is up to the caller.
 */
export async function runExtenderRound(
  extension: SchedulerExtension,
  pod: V1Pod,
  nodes: V1NodeList,
  options: ExtenderRoundOptions = {},
): Promise<ExtenderRoundResult> {
  const mode = options.prioritizeCandidates ?? 'filtered';
  const feasible = await extension.filter(pod, nodes);

  if (mode === 'filtered' && feasible.items.length === 0) {
    log.info({ pod: pod.metadata?.name, candidates: nodes.items.length }, 'no feasible nodes, skipping prioritize');
    return { feasible, priorities: [] };
  }

  const priorities = await extension.prioritize(pod, mode === 'filtered' ? feasible : nodes);
  log.debug(
    { pod: pod.metadata?.name, mode, feasible: feasible.items.length, scored: priorities.length },
    'extender round complete',
  );
  return { feasible, priorities };
}
