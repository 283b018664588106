import { STOPPED_VM_STATUSES } from "../config/constants.js";
import { truncateAppId } from "../hashing/canonicalJson.js";
import type { VmStatusEntry } from "../types/vmm.js";

export interface ObservedVm {
  id: string;
  status: string;
  appId?: string;
}

export type Decision =
  | { kind: "create"; reason: "absent" }
  | { kind: "recreate"; vm: ObservedVm; reason: "stopped" | "hash-mismatch" | "missing-app-id" }
  | { kind: "keep"; vm: ObservedVm };

/** First status entry named (or app-id'd) after the managed VM that has an id. */
export function findManagedVm(vms: VmStatusEntry[], managedVmName: string): ObservedVm | null {
  for (const vm of vms) {
    if ((vm.name === managedVmName || vm.appId === managedVmName) && vm.id) {
      return { id: vm.id, status: vm.status, appId: vm.appId };
    }
  }
  return null;
}

export function decide(observed: ObservedVm | null, newHash: string): Decision {
  if (!observed) {
    return { kind: "create", reason: "absent" };
  }
  if (STOPPED_VM_STATUSES.has(observed.status)) {
    return { kind: "recreate", vm: observed, reason: "stopped" };
  }
  if (observed.appId === undefined) {
    return { kind: "recreate", vm: observed, reason: "missing-app-id" };
  }
  if (truncateAppId(observed.appId) === truncateAppId(newHash)) {
    return { kind: "keep", vm: observed };
  }
  return { kind: "recreate", vm: observed, reason: "hash-mismatch" };
}
