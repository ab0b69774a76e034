import { Role, StatusCounts, WorkRequest } from "../types/contracts.js";
import { defaultVariants, nextRequiredRole, VariantRegistry } from "../variants/index.js";
import { isActive } from "./sla.js";

/**
 * Cross-campus transfers are only shown to the organizations involved: the
 * sending campus throughout, the receiving campus at its own step, and the
 * student at the final pickup step. Other requests are visible by role alone.
 */
export function visibleTo(req: WorkRequest, role: Role, organizationId: string | null | undefined): boolean {
  if (req.type !== "cross_campus_transfer") return true;
  if (organizationId == null) return false;

  if (req.requesterOrganizationId === organizationId) return true;
  if (req.approvalStep === 1 && req.targetOrganizationId === organizationId) return true;
  return req.approvalStep === 2 && role === "STUDENT";
}

/** Active requests waiting on `role`, oldest first. */
export function roleQueue(
  all: readonly WorkRequest[],
  role: Role,
  organizationId?: string | null,
  variants: VariantRegistry = defaultVariants
): WorkRequest[] {
  return all
    .filter((r) => isActive(r.status))
    .filter((r) => nextRequiredRole(r, variants) === role)
    .filter((r) => visibleTo(r, role, organizationId))
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

/** Active requests currently assigned to one approver, newest first. */
export function approverQueue(all: readonly WorkRequest[], approverId: string): WorkRequest[] {
  return all
    .filter((r) => isActive(r.status) && r.currentApproverId === approverId)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export function statusCounts(all: readonly WorkRequest[]): StatusCounts {
  const counts: StatusCounts = { total: all.length, pending: 0, in_progress: 0, approved: 0, rejected: 0, completed: 0, cancelled: 0 };
  for (const r of all) counts[r.status] += 1;
  return counts;
}
