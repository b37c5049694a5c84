export type RouterStep = 'embedding' | 'signals' | 'reply' | 'commit';

interface StepTiming {
  step: RouterStep;
  startedAt: number;
  finishedAt?: number;
  failed: boolean;
}

/**
 * Wall-clock timings of the router's steps for one message, reported on
 * the "Message routed" log line.
 */
export class StepTimer {
  private readonly timings: StepTiming[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  /** Run `fn` as a named step; a rejection marks the step failed and propagates */
  async time<T>(step: RouterStep, fn: () => Promise<T>): Promise<T> {
    const timing = this.begin(step);
    try {
      return await fn();
    } catch (err) {
      timing.failed = true;
      throw err;
    } finally {
      timing.finishedAt = this.clock();
    }
  }

  begin(step: RouterStep): StepTiming {
    const timing: StepTiming = { step, startedAt: this.clock(), failed: false };
    this.timings.push(timing);
    return timing;
  }

  end(timing: StepTiming, failed = false): void {
    timing.finishedAt = this.clock();
    timing.failed = timing.failed || failed;
  }

  /** Milliseconds per finished step */
  summary(): Partial<Record<RouterStep, number>> {
    const out: Partial<Record<RouterStep, number>> = {};
    for (const t of this.timings) {
      if (t.finishedAt !== undefined) out[t.step] = t.finishedAt - t.startedAt;
    }
    return out;
  }

  failedSteps(): RouterStep[] {
    return this.timings.filter((t) => t.failed).map((t) => t.step);
  }
}
