import type { Logger } from "pino";
import { TimeoutError, errorMessage } from "../errors/updaterErrors.js";
import type { Sleep, VmmClient } from "../types/interfaces.js";
import { retryWithFixedDelay, withTimeout, type RetryPolicy } from "../vmmClient/retryPolicy.js";

export type StopResult = { kind: "stopped" } | { kind: "stop-failed"; reason: string; timedOut: boolean };

export interface LifecycleTimings {
  stopTimeoutMs: number;
  /** Wait after an acknowledged stop for the guest to actually go down. */
  stopSettleMs: number;
  /** Extra pause between the stop attempt and the first remove. */
  removeGraceMs: number;
  removeRetry: Omit<RetryPolicy, "sleep">;
}

export class VmLifecycle {
  constructor(
    private readonly vmm: VmmClient,
    private readonly timings: LifecycleTimings,
    private readonly sleep: Sleep,
    private readonly log: Logger
  ) {}

  /** Best effort: never throws, the outcome is the return value. */
  async stop(vmId: string): Promise<StopResult> {
    this.log.info({ vmId }, "Stopping VM");
    try {
      await withTimeout(this.vmm.stopVm(vmId), this.timings.stopTimeoutMs, this.sleep, `StopVm ${vmId}`);
    } catch (err) {
      const timedOut = err instanceof TimeoutError;
      return { kind: "stop-failed", reason: errorMessage(err), timedOut };
    }
    this.log.info({ vmId }, "VM stop command sent, waiting for VM to stop");
    await this.sleep(this.timings.stopSettleMs);
    return { kind: "stopped" };
  }

  async remove(vmId: string): Promise<void> {
    this.log.info({ vmId }, "Removing VM");
    const policy: RetryPolicy = { ...this.timings.removeRetry, sleep: this.sleep };
    try {
      await retryWithFixedDelay(() => this.vmm.removeVm(vmId), policy, ({ attempt, attempts, error }) => {
        this.log.warn({ vmId, attempt, attempts, err: error }, "Failed to remove VM, retrying");
      });
    } catch (err) {
      this.log.error({ vmId, attempts: policy.attempts, err }, "Failed to remove VM after all attempts");
      throw err;
    }
    this.log.info({ vmId }, "VM removed");
  }

  /**
   * Stop (best effort), pause, then remove with retries. A remove that keeps
   * failing propagates and leaves the VM stopped but present for the next cycle.
   */
  async killAndRemove(vmId: string): Promise<StopResult> {
    this.log.info({ vmId }, "Killing and removing VM");
    const stopped = await this.stop(vmId);
    if (stopped.kind === "stop-failed") {
      this.log.warn(
        { vmId, reason: stopped.reason, timedOut: stopped.timedOut },
        "Failed to stop VM, will try to remove anyway"
      );
    }
    await this.sleep(this.timings.removeGraceMs);
    await this.remove(vmId);
    this.log.info({ vmId }, "VM killed and removed");
    return stopped;
  }
}
