import { defineVariant } from "./variant.js";

export const policeEvidence = defineVariant("police_evidence", {
  approvalChain: () => ["CAMPUS_COORDINATOR", "POLICE_EVIDENCE_CUSTODIAN"],

  // every police verification is at least high; stolen-item checks jump the queue
  priorityHint: (req) => (req.stolenCheck ? "urgent" : "high"),

  summary(req) {
    const tag = req.stolenCheck ? " [STOLEN CHECK]" : "";
    return `Police Verification: ${req.itemName} - ${req.verificationReason}${tag}`;
  }
});
