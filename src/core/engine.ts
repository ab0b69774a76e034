import { Approver, Priority, RoutingEvent, RoutingRecommendation, WorkRequest } from "../types/contracts.js";
import { ApproverDirectory } from "../directory/directory.js";
import { defaultVariants, nextRequiredRole, VariantRegistry } from "../variants/index.js";
import { findCandidates } from "./candidates.js";
import { selectApprover, Selection } from "./selector.js";
import { WorkloadTracker } from "./workload.js";
import { classifyPriority } from "./priority.js";
import { approachingBreach, overdueRequests } from "./sla.js";

export interface RoutingEngineOptions {
  directory: ApproverDirectory;
  tracker?: WorkloadTracker;
  variants?: VariantRegistry;
  /** Receives every routing decision; the engine itself does not log. */
  onEvent?: (ev: RoutingEvent) => void;
  now?: () => Date;
}

export class RoutingEngine {
  private directory: ApproverDirectory;
  private tracker: WorkloadTracker;
  private variants: VariantRegistry;
  private onEvent: (ev: RoutingEvent) => void;
  private now: () => Date;

  constructor(opts: RoutingEngineOptions) {
    this.directory = opts.directory;
    this.tracker = opts.tracker ?? new WorkloadTracker();
    this.variants = opts.variants ?? defaultVariants;
    this.onEvent = opts.onEvent ?? (() => {});
    this.now = opts.now ?? (() => new Date());
  }

  async findCandidates(role: string, organizationId?: string | null): Promise<Approver[]> {
    return findCandidates(await this.directory.listApprovers(), role, organizationId);
  }

  async hasAvailableApprovers(role: string, organizationId?: string | null): Promise<boolean> {
    return (await this.findCandidates(role, organizationId)).length > 0;
  }

  async findBestApprover(role: string, organizationId: string | null | undefined, priority: Priority): Promise<Approver | null> {
    const candidates = await this.findCandidates(role, organizationId);
    return this.select(candidates, role, organizationId, priority)?.approver ?? null;
  }

  determinePriority(req: WorkRequest): Priority {
    return classifyPriority(req, this.variants);
  }

  nextRequiredRole(req: WorkRequest): string | null {
    return nextRequiredRole(req, this.variants);
  }

  async recommend(req: WorkRequest): Promise<RoutingRecommendation> {
    const role = this.nextRequiredRole(req);
    if (role === null) {
      return { routable: false, reason: "Request fully approved", approver: null };
    }

    const candidates = await this.findCandidates(role, req.targetOrganizationId);
    const sel = this.select(candidates, role, req.targetOrganizationId, req.priority);
    if (!sel) {
      return { routable: false, reason: `No approvers available for role: ${role}`, approver: null };
    }

    return {
      routable: true,
      reason: `Best match: ${sel.approver.name} (workload: ${sel.workload}, role: ${role})`,
      approver: sel.approver
    };
  }

  workloadOf(approver: Approver | string): number {
    return this.tracker.workloadOf(approver);
  }

  releaseWorkload(approverId: string): number {
    const workload = this.tracker.release(approverId);
    this.onEvent({ type: "workload_released", approverId, workload });
    return workload;
  }

  workloadStatistics(): Record<string, number> {
    return this.tracker.snapshot();
  }

  resetWorkloadTracking(): void {
    this.tracker.reset();
    this.onEvent({ type: "workload_reset" });
  }

  overdueRequests<R extends WorkRequest>(all: readonly R[]): R[] {
    return overdueRequests(all, this.now());
  }

  approachingBreach<R extends WorkRequest>(all: readonly R[]): R[] {
    return approachingBreach(all, this.now());
  }

  private select(
    candidates: Approver[],
    role: string,
    organizationId: string | null | undefined,
    priority: Priority
  ): Selection | null {
    const sel = selectApprover(candidates, priority, this.tracker);
    if (!sel) {
      this.onEvent({ type: "no_approver", role, organizationId: organizationId ?? null });
      return null;
    }
    this.onEvent({
      type: "approver_selected",
      approverId: sel.approver.id,
      approverName: sel.approver.name,
      role,
      priority,
      strategy: sel.strategy,
      workload: sel.workload
    });
    return sel;
  }
}
