import { Role, WorkRequest } from "../types/contracts.js";
import { createRegistry, VariantRegistry } from "./variant.js";
import { itemClaim } from "./item-claim.js";
import { policeEvidence } from "./police-evidence.js";
import { airportTransfer, crossCampusTransfer, emergencyTransfer, transitTransfer } from "./transfers.js";
import { dispute } from "./dispute.js";

export { createRegistry, defineVariant } from "./variant.js";
export type { RequestVariant, VariantRegistry, VariantSpec } from "./variant.js";

export const defaultVariants: VariantRegistry = createRegistry([
  itemClaim,
  policeEvidence,
  airportTransfer,
  transitTransfer,
  crossCampusTransfer,
  emergencyTransfer,
  dispute
]);

export function approvalChain(req: WorkRequest, variants: VariantRegistry = defaultVariants): Role[] {
  return variants.get(req.type)?.approvalChain(req) ?? [];
}

/** Role that has to act next, or null once every step is approved. */
export function nextRequiredRole(req: WorkRequest, variants: VariantRegistry = defaultVariants): Role | null {
  const chain = approvalChain(req, variants);
  return req.approvalStep < chain.length ? chain[req.approvalStep] : null;
}

export function summarize(req: WorkRequest, variants: VariantRegistry = defaultVariants): string {
  return variants.get(req.type)?.summary(req) ?? `Request ${req.id}`;
}
