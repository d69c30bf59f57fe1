/**
 * Cycle detection for graph execution
 *
 * Keeps the trail of nodes dispatched during one invoke() and reports
 * when its tail keeps repeating the same block: a node re-running
 * itself (a -> a) or a ping-pong between nodes (a -> b -> a). The
 * trail lives for one call, so interrupt edges that pause a loop reset it.
 */

import type { LoopDetectionConfig } from '../../models/types.js';
import type { CycleCheckResult } from '../types.js';

/** Default cycle detection settings */
export const DEFAULT_LOOP_DETECTION: Required<LoopDetectionConfig> = {
  maxCycleRepeats: 3,
  action: 'warn',
};

export interface TrailingCycle {
  nodes: string[];
  /** Completed passes through the block at the end of the trail */
  repeats: number;
  /** Length of the trail tail that follows the block's pattern */
  span: number;
}

/**
 * Shortest block that the end of the trail repeats at least twice.
 *
 * [a, b, a, b, a] ends in two passes of [b, a] (span 5);
 * [x, a, a, a] ends in three passes of [a].
 */
export function findTrailingCycle(trail: readonly string[]): TrailingCycle | undefined {
  for (let length = 1; length * 2 <= trail.length; length++) {
    let matched = 0;
    for (let i = trail.length - 1; i - length >= 0 && trail[i] === trail[i - length]; i--) {
      matched++;
    }
    const span = matched + length;
    const repeats = Math.floor(span / length);
    if (repeats >= 2) {
      return { nodes: trail.slice(-length), repeats, span };
    }
  }
  return undefined;
}

export class CycleDetector {
  private readonly trail: string[] = [];
  private readonly config: Required<LoopDetectionConfig>;
  private latest: TrailingCycle | undefined;

  constructor(config?: LoopDetectionConfig) {
    this.config = {
      maxCycleRepeats: config?.maxCycleRepeats ?? DEFAULT_LOOP_DETECTION.maxCycleRepeats,
      action: config?.action ?? DEFAULT_LOOP_DETECTION.action,
    };
  }

  /** Record a dispatch and check the trail against the repeat threshold */
  record(nodeName: string): CycleCheckResult {
    this.trail.push(nodeName);
    const found = findTrailingCycle(this.trail);
    this.latest = found;
    if (!found) {
      return { repeats: 0, isLoop: false, shouldAbort: false, shouldWarn: false };
    }

    const isLoop = found.repeats > this.config.maxCycleRepeats;
    // warn once per completed pass, not on every node inside it
    const passCompleted = found.span % found.nodes.length === 0;
    return {
      cycle: found.nodes,
      repeats: found.repeats,
      isLoop,
      shouldAbort: isLoop && this.config.action === 'abort',
      shouldWarn: isLoop && passCompleted && this.config.action !== 'ignore',
    };
  }

  /** Block the most recent dispatches repeat, if they repeat one */
  currentCycle(): readonly string[] | undefined {
    return this.latest?.nodes;
  }
}
