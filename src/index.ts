export { RoutingEngine } from "./core/engine.js";
export type { RoutingEngineOptions } from "./core/engine.js";
export { WorkloadTracker } from "./core/workload.js";
export { findCandidates } from "./core/candidates.js";
export { selectApprover } from "./core/selector.js";
export type { Selection } from "./core/selector.js";
export { classifyPriority, slaHoursForPriority } from "./core/priority.js";
export { approachingBreach, hoursUntilSla, isOverdue, overdueRequests, slaTargetHours } from "./core/sla.js";
export { canTransition } from "./core/transitions.js";
export { approverQueue, roleQueue, statusCounts, visibleTo } from "./core/queue.js";
export { approvalChain, createRegistry, defaultVariants, defineVariant, nextRequiredRole, summarize } from "./variants/index.js";
export type { RequestVariant, VariantRegistry, VariantSpec } from "./variants/index.js";
export { StaticDirectory } from "./directory/directory.js";
export type { ApproverDirectory } from "./directory/directory.js";
export { FileDirectory } from "./directory/file.js";
export { FileStore } from "./store/file.js";
export type { RequestStore } from "./store/store.js";
export { createWorkflow, SubmissionSchema } from "./plugin/createWorkflow.js";
export type { RouteResult, Workflow, WorkflowResult } from "./plugin/createWorkflow.js";
export { makeRoutes } from "./api/routes.js";
export { createApp } from "./app.js";
export type {
  Approver,
  AuditEvent,
  Priority,
  Role,
  RoutingEvent,
  RoutingRecommendation,
  Status,
  StatusCounts,
  WorkRequest
} from "./types/contracts.js";
