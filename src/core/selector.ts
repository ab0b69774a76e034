import { Approver, Priority, SelectionStrategy } from "../types/contracts.js";
import { WorkloadTracker } from "./workload.js";

export interface Selection {
  approver: Approver;
  strategy: SelectionStrategy;
  workload: number; // after this selection
}

function leastBusy(candidates: readonly Approver[], tracker: WorkloadTracker): Approver {
  let best = candidates[0];
  let min = tracker.workloadOf(best);
  for (const c of candidates) {
    const w = tracker.workloadOf(c);
    if (w < min) {
      min = w;
      best = c;
    }
  }
  return best;
}

// Named for load balancing but, like leastBusy, it takes the least loaded candidate.
// Nothing rotates among equally loaded approvers.
function balanced(candidates: readonly Approver[], tracker: WorkloadTracker): Approver {
  const sorted = [...candidates].sort((a, b) => tracker.workloadOf(a) - tracker.workloadOf(b));
  return sorted[0];
}

/**
 * Picks one approver and counts the new assignment against them.
 * Reading workloads and incrementing the winner happen in one synchronous pass.
 */
export function selectApprover(
  candidates: readonly Approver[],
  priority: Priority,
  tracker: WorkloadTracker
): Selection | null {
  if (candidates.length === 0) return null;

  let approver: Approver;
  let strategy: SelectionStrategy;
  if (candidates.length === 1) {
    approver = candidates[0];
    strategy = "sole";
  } else if (priority === "urgent") {
    approver = leastBusy(candidates, tracker);
    strategy = "least_busy";
  } else {
    approver = balanced(candidates, tracker);
    strategy = "balanced";
  }

  const workload = tracker.increment(approver);
  return { approver, strategy, workload };
}
