import { Status, WorkRequest } from "../types/contracts.js";
import { slaHoursForPriority } from "./priority.js";

const HOUR_MS = 60 * 60 * 1000;

/** Share of the SLA window left below which a request counts as approaching breach. */
export const APPROACHING_FRACTION = 0.2;

export function isActive(status: Status): boolean {
  return status === "pending" || status === "in_progress";
}

export function slaTargetHours(req: WorkRequest): number {
  return req.slaTargetHours ?? slaHoursForPriority(req.priority);
}

/** Whole hours since creation, truncated. */
export function hoursElapsed(req: WorkRequest, now: Date): number {
  return Math.trunc((now.getTime() - Date.parse(req.createdAt)) / HOUR_MS);
}

/** Negative once the SLA has been breached. */
export function hoursUntilSla(req: WorkRequest, now: Date): number {
  return slaTargetHours(req) - hoursElapsed(req, now);
}

export function isOverdue(req: WorkRequest, now: Date): boolean {
  return isActive(req.status) && hoursElapsed(req, now) > slaTargetHours(req);
}

/** Overdue requests, oldest first. */
export function overdueRequests<R extends WorkRequest>(all: readonly R[], now: Date = new Date()): R[] {
  return all
    .filter((r) => isOverdue(r, now))
    .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
}

/**
 * Active requests with less than a fifth of their SLA window left but not yet
 * breached, most urgent first. Requests without a positive target are skipped.
 */
export function approachingBreach<R extends WorkRequest>(all: readonly R[], now: Date = new Date()): R[] {
  return all
    .filter((r) => {
      if (!isActive(r.status)) return false;
      const total = slaTargetHours(r);
      if (!(total > 0)) return false;
      const fraction = hoursUntilSla(r, now) / total;
      return fraction > 0 && fraction < APPROACHING_FRACTION;
    })
    .sort((a, b) => hoursUntilSla(a, now) - hoursUntilSla(b, now));
}
