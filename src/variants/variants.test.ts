import { describe, it } from "node:test";
import assert from "node:assert";
import { approvalChain, createRegistry, nextRequiredRole, summarize } from "./index.js";
import { destinationApprovalRole } from "./transfers.js";
import { dispute as disputeVariant } from "./dispute.js";
import { airport, claim, dispute, evidence, transit } from "../testing/factories.js";
import { CrossCampusTransferRequest, EmergencyTransferRequest } from "../types/contracts.js";

describe("approval chains", () => {
  it("should start every claim with the campus coordinator", () => {
    assert.deepStrictEqual(approvalChain(claim()), ["CAMPUS_COORDINATOR"]);
  });

  it("should add the holding enterprise's approver to a claim", () => {
    assert.deepStrictEqual(approvalChain(claim({ holdingEnterpriseType: "PUBLIC_TRANSIT" })), ["CAMPUS_COORDINATOR", "STATION_MANAGER"]);
    assert.deepStrictEqual(approvalChain(claim({ holdingEnterpriseType: "HIGHER_EDUCATION" })), ["CAMPUS_COORDINATOR"]);
  });

  it("should end a high-value claim with police verification once", () => {
    assert.deepStrictEqual(
      approvalChain(claim({ highValue: true, holdingEnterpriseType: "AIRPORT" })),
      ["CAMPUS_COORDINATOR", "AIRPORT_LOST_FOUND_SPECIALIST", "POLICE_EVIDENCE_CUSTODIAN"]
    );
    assert.deepStrictEqual(
      approvalChain(claim({ highValue: true, holdingEnterpriseType: "LAW_ENFORCEMENT" })),
      ["CAMPUS_COORDINATOR", "POLICE_EVIDENCE_CUSTODIAN"]
    );
  });

  it("should give fixed chains to evidence, transfers and disputes", () => {
    assert.deepStrictEqual(approvalChain(evidence()), ["CAMPUS_COORDINATOR", "POLICE_EVIDENCE_CUSTODIAN"]);
    assert.deepStrictEqual(approvalChain(airport()), ["AIRPORT_LOST_FOUND_SPECIALIST", "CAMPUS_COORDINATOR", "POLICE_EVIDENCE_CUSTODIAN", "STUDENT"]);
    assert.deepStrictEqual(approvalChain(transit()), ["STATION_MANAGER", "CAMPUS_COORDINATOR", "STUDENT"]);
    assert.deepStrictEqual(approvalChain(dispute()), ["POLICE_EVIDENCE_CUSTODIAN"]);

    const emergency: EmergencyTransferRequest = { ...transit(), type: "emergency_transfer", flightNumber: "DL 42" };
    assert.deepStrictEqual(approvalChain(emergency), ["STATION_MANAGER", "AIRPORT_LOST_FOUND_SPECIALIST"]);
  });

  it("should pick the cross-campus destination approver from its name", () => {
    const cross: CrossCampusTransferRequest = { ...transit(), type: "cross_campus_transfer", destinationName: "Logan Terminal B" };
    assert.deepStrictEqual(approvalChain(cross), ["CAMPUS_COORDINATOR", "AIRPORT_LOST_FOUND_SPECIALIST", "STUDENT"]);
    assert.strictEqual(destinationApprovalRole("MBTA Back Bay"), "STATION_MANAGER");
    assert.strictEqual(destinationApprovalRole("NUPD Headquarters"), "POLICE_EVIDENCE_CUSTODIAN");
    assert.strictEqual(destinationApprovalRole("Boston University"), "CAMPUS_COORDINATOR");
    assert.strictEqual(destinationApprovalRole(undefined), "CAMPUS_COORDINATOR");
  });
});

describe("nextRequiredRole", () => {
  it("should follow the approval step and end with null", () => {
    assert.strictEqual(nextRequiredRole(evidence({ approvalStep: 0 })), "CAMPUS_COORDINATOR");
    assert.strictEqual(nextRequiredRole(evidence({ approvalStep: 1 })), "POLICE_EVIDENCE_CUSTODIAN");
    assert.strictEqual(nextRequiredRole(evidence({ approvalStep: 2 })), null);
  });

  it("should be null for a variant missing from the registry", () => {
    const onlyDisputes = createRegistry([disputeVariant]);
    assert.strictEqual(nextRequiredRole(evidence(), onlyDisputes), null);
    assert.strictEqual(nextRequiredRole(dispute(), onlyDisputes), "POLICE_EVIDENCE_CUSTODIAN");
  });
});

describe("summarize", () => {
  it("should describe claims with their tags", () => {
    assert.strictEqual(
      summarize(claim({ highValue: true, holdingEnterpriseType: "AIRPORT" })),
      "Item Claim: Blue Backpack [HIGH VALUE] [AIRPORT] - Claimed by Sam Student"
    );
  });

  it("should flag stolen checks and disputes", () => {
    assert.strictEqual(summarize(evidence({ stolenCheck: true })), "Police Verification: Road Bike - serial number lookup [STOLEN CHECK]");
    assert.strictEqual(summarize(dispute()), "DISPUTE: Watch - 2 claimants");
  });
});
