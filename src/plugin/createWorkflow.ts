import { z } from "zod";
import { pino, type Logger } from "pino";
import { nanoid } from "nanoid";
import { RequestStore } from "../store/store.js";
import { ApproverDirectory } from "../directory/directory.js";
import { RoutingEngine } from "../core/engine.js";
import { WorkloadTracker } from "../core/workload.js";
import { canTransition } from "../core/transitions.js";
import { isActive } from "../core/sla.js";
import { approverQueue, roleQueue, statusCounts } from "../core/queue.js";
import { makeAudit } from "../audit/audit.js";
import { KeyedQueue } from "../lib/keyed-queue.js";
import { approvalChain, defaultVariants, summarize, VariantRegistry } from "../variants/index.js";
import {
  priorities,
  Role,
  RoutingEvent,
  RoutingRecommendation,
  Status,
  StatusCounts,
  WorkRequest
} from "../types/contracts.js";

const PriorityEnum = z.enum(priorities);

const common = {
  requesterId: z.string().min(1),
  requesterName: z.string().min(1).optional(),
  requesterOrganizationId: z.string().min(1).optional(),
  targetOrganizationId: z.string().min(1).nullable().optional(),
  priority: PriorityEnum.optional(),
  slaTargetHours: z.number().nonnegative().optional(),
  description: z.string().optional(),
  itemId: z.string().min(1),
  itemName: z.string().min(1)
};

export const SubmissionSchema = z.discriminatedUnion("type", [
  z.object({
    ...common,
    type: z.literal("item_claim"),
    itemValue: z.number().nonnegative(),
    highValue: z.boolean().default(false),
    holdingEnterpriseType: z.enum(["HIGHER_EDUCATION", "PUBLIC_TRANSIT", "AIRPORT", "LAW_ENFORCEMENT"]).optional()
  }),
  z.object({
    ...common,
    type: z.literal("police_evidence"),
    stolenCheck: z.boolean().default(false),
    verificationReason: z.string().min(1),
    estimatedValue: z.number().nonnegative().optional()
  }),
  z.object({ ...common, type: z.literal("airport_transfer"), secureArea: z.boolean().default(false), terminal: z.string().optional() }),
  z.object({ ...common, type: z.literal("transit_transfer"), stationName: z.string().optional() }),
  z.object({ ...common, type: z.literal("cross_campus_transfer"), destinationName: z.string().optional() }),
  z.object({ ...common, type: z.literal("emergency_transfer"), flightNumber: z.string().optional() }),
  z.object({ ...common, type: z.literal("dispute"), claimantIds: z.array(z.string().min(1)).min(2) })
]);

export type Submission = z.infer<typeof SubmissionSchema>;

export type WorkflowError = "not_found" | "not_pending" | "forbidden" | "invalid_transition";

export type WorkflowFailure = { ok: false; error: WorkflowError; from?: Status; to?: Status };
export type WorkflowResult = { ok: true; request: WorkRequest } | WorkflowFailure;

export type Routed = { request: WorkRequest; recommendation: RoutingRecommendation };
export type RouteResult = ({ ok: true } & Routed) | WorkflowFailure;

export function createWorkflow(args: {
  store: RequestStore;
  directory: ApproverDirectory;
  tracker?: WorkloadTracker;
  variants?: VariantRegistry;
  logger?: Logger;
  now?: () => Date;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const variants = args.variants ?? defaultVariants;
  const now = args.now ?? (() => new Date());
  const stamp = () => now().toISOString();
  // mutations of one request run one after another
  const queue = new KeyedQueue();

  const engine = new RoutingEngine({
    directory: args.directory,
    tracker: args.tracker,
    variants,
    now,
    onEvent: (ev: RoutingEvent) => {
      if (ev.type === "no_approver") log.warn(ev, "routing: no_approver");
      else log.info(ev, `routing: ${ev.type}`);
    }
  });

  async function findApprover(id: string) {
    const all = await args.directory.listApprovers();
    return all.find((a) => a.id === id) ?? null;
  }

  function advance(req: WorkRequest, approverId: string, at: string): WorkRequest {
    const step = req.approvalStep + 1;
    const done = step >= approvalChain(req, variants).length;
    return {
      ...req,
      approverIds: [...req.approverIds, approverId],
      approvalStep: step,
      status: done ? "approved" : "in_progress",
      currentApproverId: undefined,
      updatedAt: at
    };
  }

  function releaseCurrent(req: WorkRequest): WorkRequest {
    if (!req.currentApproverId) return req;
    engine.releaseWorkload(req.currentApproverId);
    return { ...req, currentApproverId: undefined };
  }

  async function assignNext(req: WorkRequest): Promise<Routed> {
    const recommendation = await engine.recommend(req);
    if (!recommendation.approver) return { request: req, recommendation };
    return { request: { ...req, currentApproverId: recommendation.approver.id }, recommendation };
  }

  async function auditAssigned(req: WorkRequest, { request, recommendation }: Routed) {
    if (!request.currentApproverId) return;
    await args.store.appendAudit(makeAudit({
      requestId: request.id,
      type: "assigned",
      payload: { approverId: request.currentApproverId, role: engine.nextRequiredRole(req), reason: recommendation.reason },
      at: stamp()
    }));
  }

  /** Saves a routed request; on failure the new assignment is taken back off the approver's workload. */
  async function persist(routed: Routed, save: (req: WorkRequest) => Promise<void>) {
    try {
      await save(routed.request);
    } catch (err) {
      if (routed.recommendation.approver) engine.releaseWorkload(routed.recommendation.approver.id);
      throw err;
    }
  }

  async function submit(raw: unknown): Promise<{ ok: true } & Routed> {
    const sub = SubmissionSchema.parse(raw);
    const at = now().toISOString();

    let req: WorkRequest = {
      ...sub,
      id: nanoid(),
      status: "pending",
      priority: sub.priority ?? "normal",
      approvalStep: 0,
      approverIds: [],
      createdAt: at,
      updatedAt: at
    };

    if (req.priority === "normal") {
      req = { ...req, priority: engine.determinePriority(req) };
    }

    // an initiator who already holds the first role has approved by submitting
    const requester = await findApprover(req.requesterId);
    if (requester && requester.role === engine.nextRequiredRole(req)) {
      req = advance(req, requester.id, at);
      log.info({ requestId: req.id, role: requester.role }, "request: auto_advanced");
    }

    const routed = await assignNext(req);
    await persist(routed, (r) => args.store.createRequest(r));

    await args.store.appendAudit(makeAudit({
      requestId: req.id,
      type: "created",
      actor: req.requesterId,
      payload: { type: req.type, priority: req.priority, summary: summarize(req, variants) },
      at
    }));
    await auditAssigned(req, routed);

    const { request, recommendation } = routed;

    log.info({ requestId: request.id, priority: request.priority }, "request: created");
    return { ok: true, request, recommendation };
  }

  async function loadActive(id: string, approverId: string) {
    const current = await args.store.getRequest(id);
    if (!current) return { ok: false as const, error: "not_found" as const };
    if (!isActive(current.status)) return { ok: false as const, error: "not_pending" as const };

    const approver = await findApprover(approverId);
    if (!approver || approver.role !== engine.nextRequiredRole(current)) {
      return { ok: false as const, error: "forbidden" as const };
    }
    return { ok: true as const, current, approver };
  }

  function approve(id: string, approverId: string): Promise<WorkflowResult> {
    return queue.run<WorkflowResult>(id, async () => {
      const loaded = await loadActive(id, approverId);
      if (!loaded.ok) return loaded;
      const { current, approver } = loaded;

      const at = stamp();
      const advanced = advance(releaseCurrent(current), approver.id, at);
      const routed = await assignNext(advanced);
      await persist(routed, (r) => args.store.saveRequest(r));

      const next = routed.request;
      await args.store.appendAudit(makeAudit({
        requestId: id,
        type: "approved",
        actor: approver.id,
        payload: { role: approver.role, step: next.approvalStep, status: next.status },
        at
      }));
      await auditAssigned(advanced, routed);

      log.info({ requestId: id, approverId: approver.id, status: next.status }, "request: approved");
      return { ok: true, request: next };
    });
  }

  function reject(id: string, approverId: string, reason: string): Promise<WorkflowResult> {
    const why = z.string().min(1).parse(reason);
    return queue.run<WorkflowResult>(id, async () => {
      const loaded = await loadActive(id, approverId);
      if (!loaded.ok) return loaded;
      const { current, approver } = loaded;

      const at = stamp();
      const note = `REJECTED: ${why} - Rejected by ${approver.name}`;
      const next: WorkRequest = {
        ...releaseCurrent(current),
        status: "rejected",
        notes: current.notes ? `${current.notes}\n${note}` : note,
        updatedAt: at
      };

      await args.store.saveRequest(next);
      await args.store.appendAudit(makeAudit({ requestId: id, type: "rejected", actor: approver.id, payload: { reason: why }, at }));

      log.info({ requestId: id, approverId: approver.id }, "request: rejected");
      return { ok: true, request: next };
    });
  }

  function complete(id: string): Promise<WorkflowResult> {
    return queue.run<WorkflowResult>(id, async () => {
      const current = await args.store.getRequest(id);
      if (!current) return { ok: false, error: "not_found" };
      if (!canTransition(current.status, "completed")) {
        return { ok: false, error: "invalid_transition", from: current.status, to: "completed" };
      }

      const at = stamp();
      const next: WorkRequest = { ...current, status: "completed", completedAt: at, updatedAt: at };
      await args.store.saveRequest(next);
      await args.store.appendAudit(makeAudit({ requestId: id, type: "completed", at }));

      log.info({ requestId: id }, "request: completed");
      return { ok: true, request: next };
    });
  }

  function cancel(id: string, requesterId: string): Promise<WorkflowResult> {
    return queue.run<WorkflowResult>(id, async () => {
      const current = await args.store.getRequest(id);
      if (!current) return { ok: false, error: "not_found" };
      if (current.requesterId !== requesterId) return { ok: false, error: "forbidden" };
      if (!canTransition(current.status, "cancelled")) {
        return { ok: false, error: "invalid_transition", from: current.status, to: "cancelled" };
      }

      const at = stamp();
      const next: WorkRequest = { ...releaseCurrent(current), status: "cancelled", updatedAt: at };
      await args.store.saveRequest(next);
      await args.store.appendAudit(makeAudit({ requestId: id, type: "cancelled", actor: requesterId, at }));

      log.info({ requestId: id }, "request: cancelled");
      return { ok: true, request: next };
    });
  }

  /** Re-runs routing for an active request, handing it to a fresh approver. */
  function route(id: string): Promise<RouteResult> {
    return queue.run<RouteResult>(id, async () => {
      const current = await args.store.getRequest(id);
      if (!current) return { ok: false, error: "not_found" };
      if (!isActive(current.status)) return { ok: false, error: "not_pending" };

      const released = { ...releaseCurrent(current), updatedAt: stamp() };
      const routed = await assignNext(released);
      await persist(routed, (r) => args.store.saveRequest(r));
      await auditAssigned(released, routed);

      log.info({ requestId: id, routable: routed.recommendation.routable }, "request: routed");
      return { ok: true, ...routed };
    });
  }

  async function overdue(): Promise<WorkRequest[]> {
    return engine.overdueRequests(await args.store.allRequests());
  }

  async function approaching(): Promise<WorkRequest[]> {
    return engine.approachingBreach(await args.store.allRequests());
  }

  /** Active requests waiting on `role`; cross-campus transfers only for the campuses involved. */
  async function queueForRole(role: Role, organizationId?: string | null): Promise<WorkRequest[]> {
    return roleQueue(await args.store.allRequests(), role, organizationId, variants);
  }

  async function queueForApprover(approverId: string): Promise<WorkRequest[]> {
    return approverQueue(await args.store.allRequests(), approverId);
  }

  async function stats(): Promise<StatusCounts> {
    return statusCounts(await args.store.allRequests());
  }

  return {
    engine,
    submit,
    approve,
    reject,
    complete,
    cancel,
    route,
    overdue,
    approaching,
    queueForRole,
    queueForApprover,
    stats,
    workload: () => engine.workloadStatistics(),
    resetWorkload: () => engine.resetWorkloadTracking()
  };
}

export type Workflow = ReturnType<typeof createWorkflow>;
