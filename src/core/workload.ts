import { Approver } from "../types/contracts.js";

type ApproverRef = Approver | string;

function idOf(ref: ApproverRef): string {
  return typeof ref === "string" ? ref : ref.id;
}

/**
 * Active assignments per approver, for this process only.
 *
 * Every operation reads and writes the counter in one synchronous step, so
 * callers on the same event loop never lose an update. Counts drift from the
 * request store if a caller forgets to release, and vanish on restart.
 */
export class WorkloadTracker {
  private counts = new Map<string, number>();

  workloadOf(ref: ApproverRef): number {
    return this.counts.get(idOf(ref)) ?? 0;
  }

  increment(ref: ApproverRef): number {
    const id = idOf(ref);
    const next = (this.counts.get(id) ?? 0) + 1;
    this.counts.set(id, next);
    return next;
  }

  /** Decrements, floored at zero. Releasing an idle approver is a no-op. */
  release(approverId: string): number {
    const current = this.counts.get(approverId) ?? 0;
    if (current <= 0) return 0;
    const next = current - 1;
    this.counts.set(approverId, next);
    return next;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  reset(): void {
    this.counts.clear();
  }
}
