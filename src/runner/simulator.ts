import { setImmediate as yieldToLoop, setTimeout as sleep } from "node:timers/promises";
import type { Autosaver } from "../service/autosave";
import type { Logger } from "../sim/config";
import { CancelledError, InvalidArgumentError, errorMessage } from "../sim/errors";
import type { Unsubscribe } from "../sim/eventBus";
import type { TickSummary } from "../sim/types";
import type { World } from "../sim/world";

export type StepCallback = (summary: TickSummary, world: World) => void;

export type SimulatorOptions = {
  logger?: Logger;
  autosaver?: Autosaver;
};

export type RunOptions = {
  steps: number;
  minutesPerStep?: number;
  // Real-time pause between steps.
  intervalMs?: number;
  signal?: AbortSignal;
};

export type RunResult = {
  stepsCompleted: number;
  summaries: TickSummary[];
  // Set when the signal stopped the run early. Partial results above are still valid.
  cancelled?: CancelledError;
};

export type SimulationReport = {
  steps: number;
  minutes: number;
  eventsEmitted: number;
  errors: number;
};

export type SimulatorStatistics = {
  steps: number;
  minutesSimulated: number;
  eventsEmitted: number;
  tickErrors: number;
  callbackFailures: number;
};

const DEFAULT_STEP_MINUTES = 60;

/**
 * Drives a World. Holds nothing but its callbacks and counters; pacing is the caller's.
 */
export class Simulator {
  private readonly callbacks: StepCallback[] = [];
  private readonly logger: Logger;
  private readonly autosaver: Autosaver | null;
  private stats: SimulatorStatistics = { steps: 0, minutesSimulated: 0, eventsEmitted: 0, tickErrors: 0, callbackFailures: 0 };

  constructor(
    readonly world: World,
    opts: SimulatorOptions = {}
  ) {
    this.logger = opts.logger ?? console;
    this.autosaver = opts.autosaver ?? null;
  }

  onStep(cb: StepCallback): Unsubscribe {
    this.callbacks.push(cb);
    return () => {
      const i = this.callbacks.indexOf(cb);
      if (i >= 0) this.callbacks.splice(i, 1);
    };
  }

  step(minutes: number = DEFAULT_STEP_MINUTES): TickSummary {
    const summary = this.world.tick(minutes);
    this.stats = {
      ...this.stats,
      steps: this.stats.steps + 1,
      minutesSimulated: this.stats.minutesSimulated + summary.deltaMinutes,
      eventsEmitted: this.stats.eventsEmitted + summary.eventsEmitted,
      tickErrors: this.stats.tickErrors + summary.errors
    };

    if (this.world.config.debug.logTicks) {
      this.logger.info(
        `[sim] ${this.world.clock.formatDateTime()} +${summary.deltaMinutes}m events=${summary.eventsEmitted} changed=${summary.changedEntityIds.length} errors=${summary.errors}`
      );
    }

    for (const cb of [...this.callbacks]) {
      try {
        cb(summary, this.world);
      } catch (err) {
        this.stats.callbackFailures++;
        this.logger.error(`[sim] step callback failed: ${errorMessage(err)}`);
      }
    }

    this.autosaver?.afterTick(this.world, summary);
    return summary;
  }

  /** Checks the signal before every step, never inside one. Yields between steps. */
  async run(opts: RunOptions): Promise<RunResult> {
    const { steps, minutesPerStep = DEFAULT_STEP_MINUTES, intervalMs = 0, signal } = opts;
    if (!Number.isInteger(steps) || steps < 0) throw new InvalidArgumentError(`steps must be a non-negative integer (got ${steps})`);

    const summaries: TickSummary[] = [];
    for (let i = 0; i < steps; i++) {
      if (signal?.aborted) return { stepsCompleted: i, summaries, cancelled: new CancelledError(i) };
      summaries.push(this.step(minutesPerStep));
      // Yield even without a pause; the signal may be aborted from a timer or I/O callback.
      if (i < steps - 1) await (intervalMs > 0 ? sleep(intervalMs) : yieldToLoop());
    }
    return { stepsCompleted: steps, summaries };
  }

  simulateHours(hours: number, minutesPerStep: number = DEFAULT_STEP_MINUTES): SimulationReport {
    const total = hours * 60;
    if (!Number.isInteger(total) || total <= 0) throw new InvalidArgumentError(`hours must be positive (got ${hours})`);
    if (!Number.isInteger(minutesPerStep) || minutesPerStep <= 0) {
      throw new InvalidArgumentError(`minutesPerStep must be a positive integer (got ${minutesPerStep})`);
    }

    const report: SimulationReport = { steps: 0, minutes: 0, eventsEmitted: 0, errors: 0 };
    let left = total;
    while (left > 0) {
      const m = Math.min(minutesPerStep, left);
      addToReport(report, this.step(m));
      left -= m;
    }
    return report;
  }

  simulateDays(days: number, minutesPerStep: number = DEFAULT_STEP_MINUTES): SimulationReport {
    return this.simulateHours(days * 24, minutesPerStep);
  }

  /** Step until the calendar day changes. */
  simulateDay(minutesPerStep: number = DEFAULT_STEP_MINUTES): SimulationReport {
    const startDay = this.world.clock.day;
    const report: SimulationReport = { steps: 0, minutes: 0, eventsEmitted: 0, errors: 0 };
    while (this.world.clock.day === startDay) {
      const m = Math.min(minutesPerStep, this.world.clock.minutesUntilNext("day"));
      addToReport(report, this.step(m));
    }
    return report;
  }

  /** Step until `predicate` holds after a step, or `maxSteps` run out. */
  runUntil(
    predicate: (world: World, last: TickSummary) => boolean,
    opts: { maxSteps: number; minutesPerStep?: number }
  ): { satisfied: boolean; steps: number } {
    const m = opts.minutesPerStep ?? DEFAULT_STEP_MINUTES;
    for (let i = 1; i <= opts.maxSteps; i++) {
      const s = this.step(m);
      if (predicate(this.world, s)) return { satisfied: true, steps: i };
    }
    return { satisfied: false, steps: opts.maxSteps };
  }

  statistics(): SimulatorStatistics {
    return { ...this.stats };
  }
}

function addToReport(r: SimulationReport, s: TickSummary): void {
  r.steps++;
  r.minutes += s.deltaMinutes;
  r.eventsEmitted += s.eventsEmitted;
  r.errors += s.errors;
}
