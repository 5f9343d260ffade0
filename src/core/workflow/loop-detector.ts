/**
 * Loop detection for workflow execution
 *
 * Detects when the same step is executed repeatedly in a row,
 * which may indicate an infinite loop.
 */

import type { LoopCheckResult, LoopDetectionConfig } from './types.js';

const DEFAULT_LOOP_DETECTION: Required<LoopDetectionConfig> = {
  maxConsecutiveSameStep: 10,
  action: 'warn',
};

export class LoopDetector {
  private lastStep: string | null = null;
  private consecutiveCount = 0;
  private config: Required<LoopDetectionConfig>;

  constructor(config?: LoopDetectionConfig) {
    this.config = {
      ...DEFAULT_LOOP_DETECTION,
      ...config,
    };
  }

  /**
   * Record one execution of `step` and report whether it is looping.
   */
  check(step: string): LoopCheckResult {
    if (this.lastStep === step) {
      this.consecutiveCount++;
    } else {
      this.consecutiveCount = 1;
      this.lastStep = step;
    }

    const isLoop = this.consecutiveCount > this.config.maxConsecutiveSameStep;
    return {
      isLoop,
      count: this.consecutiveCount,
      shouldAbort: isLoop && this.config.action === 'abort',
      shouldWarn: isLoop && this.config.action !== 'ignore',
    };
  }
}
