import { describe, it } from "node:test";
import assert from "node:assert";
import { findCandidates } from "./candidates.js";
import { approver } from "../testing/factories.js";

const directory = [
  approver("c1", "CAMPUS_COORDINATOR", "neu"),
  approver("p1", "POLICE_EVIDENCE_CUSTODIAN", "bpd"),
  approver("c2", "CAMPUS_COORDINATOR", "bu"),
  approver("c3", "CAMPUS_COORDINATOR", "neu"),
  approver("s1", "STATION_MANAGER", null)
];

describe("findCandidates", () => {
  it("should keep only the preferred organization when someone there holds the role", () => {
    const ids = findCandidates(directory, "CAMPUS_COORDINATOR", "neu").map((a) => a.id);
    assert.deepStrictEqual(ids, ["c1", "c3"]);
  });

  it("should return every holder of the role when no organization is preferred", () => {
    const ids = findCandidates(directory, "CAMPUS_COORDINATOR").map((a) => a.id);
    assert.deepStrictEqual(ids, ["c1", "c2", "c3"]);
    assert.deepStrictEqual(findCandidates(directory, "CAMPUS_COORDINATOR", null).map((a) => a.id), ["c1", "c2", "c3"]);
  });

  it("should fall back to any organization when the preferred one has nobody", () => {
    const ids = findCandidates(directory, "POLICE_EVIDENCE_CUSTODIAN", "neu").map((a) => a.id);
    assert.deepStrictEqual(ids, ["p1"]);
  });

  it("should compare an empty organization like any other value", () => {
    const people = [approver("d1", "DETECTIVE", ""), approver("d2", "DETECTIVE", "bpd")];
    assert.deepStrictEqual(findCandidates(people, "DETECTIVE", "").map((a) => a.id), ["d1"]);
  });

  it("should return an empty list for a role nobody holds", () => {
    assert.deepStrictEqual(findCandidates(directory, "DETECTIVE", "neu"), []);
    assert.deepStrictEqual(findCandidates(directory, "NOT_A_ROLE"), []);
  });
});
