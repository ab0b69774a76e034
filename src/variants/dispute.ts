import { defineVariant } from "./variant.js";

export const dispute = defineVariant("dispute", {
  // police are the authority on ownership disputes
  approvalChain: () => ["POLICE_EVIDENCE_CUSTODIAN"],
  priorityHint: () => null,
  summary: (req) => `DISPUTE: ${req.itemName} - ${req.claimantIds.length} claimants`
});
