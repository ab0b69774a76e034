import { HoldingEnterpriseType, Role } from "../types/contracts.js";
import { defineVariant } from "./variant.js";

export const HIGH_VALUE_URGENT_THRESHOLD = 1000;

// Higher education holders are approved by the campus coordinator already first in the chain.
const holdingRoles: Partial<Record<HoldingEnterpriseType, Role>> = {
  PUBLIC_TRANSIT: "STATION_MANAGER",
  AIRPORT: "AIRPORT_LOST_FOUND_SPECIALIST",
  LAW_ENFORCEMENT: "POLICE_EVIDENCE_CUSTODIAN"
};

export function holdingApprovalRole(t: HoldingEnterpriseType | undefined): Role | null {
  if (!t) return null;
  return holdingRoles[t] ?? null;
}

export const itemClaim = defineVariant("item_claim", {
  approvalChain(req) {
    const chain: Role[] = ["CAMPUS_COORDINATOR"];
    const external = holdingApprovalRole(req.holdingEnterpriseType);
    if (external) chain.push(external);
    if (req.highValue && external !== "POLICE_EVIDENCE_CUSTODIAN") chain.push("POLICE_EVIDENCE_CUSTODIAN");
    return chain;
  },

  priorityHint(req) {
    if (!req.highValue) return null;
    return req.itemValue > HIGH_VALUE_URGENT_THRESHOLD ? "urgent" : "high";
  },

  summary(req) {
    const tags = (req.highValue ? " [HIGH VALUE]" : "") + (req.holdingEnterpriseType ? ` [${req.holdingEnterpriseType}]` : "");
    return `Item Claim: ${req.itemName}${tags} - Claimed by ${req.requesterName ?? req.requesterId}`;
  }
});
