import { Approver } from "../types/contracts.js";

/**
 * Approvers qualified to act for `role`, preferring the given organization.
 * Falls back to every holder of the role so a request is never stranded just
 * because nobody in the target organization holds it. Order is preserved.
 */
export function findCandidates(
  approvers: readonly Approver[],
  role: string,
  organizationId?: string | null
): Approver[] {
  const withRole = approvers.filter((a) => a.role === role);
  if (organizationId == null) return withRole;

  const exact = withRole.filter((a) => a.organizationId === organizationId);
  return exact.length > 0 ? exact : withRole;
}
