import type { Logger } from "pino";
import { withSpan } from "../telemetry/otel.js";
import type { Sleep } from "../types/interfaces.js";
import type { CycleOutcome, Reconciler, ReconcilerState } from "./reconciler.js";

export interface ReconcileLoopOptions {
  pollIntervalMs: number;
  sleep: Sleep;
  logger: Logger;
}

/**
 * Runs cycles back to back with a fixed pause after each one, so the cadence is
 * interval + cycle time. A failed cycle is logged and the previous state is kept.
 */
export class ReconcileLoop {
  private state: ReconcilerState;
  private cycles = 0;

  constructor(
    private readonly reconciler: Reconciler,
    private readonly options: ReconcileLoopOptions,
    initialState: ReconcilerState = {}
  ) {
    this.state = { ...initialState };
  }

  /** Returns the state a cycle left behind; it never rejects. */
  async runOnce(): Promise<ReconcilerState> {
    const before = this.state;
    this.cycles += 1;
    const cycle = this.cycles;
    try {
      const outcome = await withSpan(
        "reconcile.cycle",
        { "vm.id": before.vmId ?? "", "compose.hash.current": before.currentHash ?? "" },
        async (setAttributes) => {
          const result: CycleOutcome = await this.reconciler.reconcile(before);
          setAttributes({ "reconcile.decision": result.decision, "compose.hash.desired": result.state.currentHash ?? "" });
          return result;
        }
      );
      this.state = outcome.state;
    } catch (err) {
      this.options.logger.error(
        { err, cycle, vmId: before.vmId, currentHash: before.currentHash },
        cycle === 1 ? "Initial check failed" : "Update check failed"
      );
    }
    return this.state;
  }

  /**
   * Loops until `signal` aborts. The signal is only looked at between cycles;
   * a cycle in flight always runs to completion.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.options.logger.info({ pollIntervalMs: this.options.pollIntervalMs }, "Starting auto-updater");
    while (!signal?.aborted) {
      await this.runOnce();
      if (signal?.aborted) break;
      try {
        await this.options.sleep(this.options.pollIntervalMs, signal);
      } catch (err) {
        if (signal?.aborted) break;
        throw err;
      }
    }
    this.options.logger.info("Auto-updater stopped");
  }

  get currentState(): ReconcilerState {
    return { ...this.state };
  }
}
