import { describe, it } from "node:test";
import assert from "node:assert";
import { classifyPriority, slaHoursForPriority } from "./priority.js";
import { createRegistry } from "../variants/index.js";
import { policeEvidence } from "../variants/police-evidence.js";
import { airport, claim, dispute, evidence, transit } from "../testing/factories.js";

describe("classifyPriority", () => {
  it("should return urgent for a high-value claim above 1000", () => {
    assert.strictEqual(classifyPriority(claim({ highValue: true, itemValue: 1500 })), "urgent");
  });

  it("should return high for a high-value claim at or below 1000", () => {
    assert.strictEqual(classifyPriority(claim({ highValue: true, itemValue: 500 })), "high");
    assert.strictEqual(classifyPriority(claim({ highValue: true, itemValue: 1000 })), "high");
  });

  it("should return normal for a claim that is not flagged high value", () => {
    assert.strictEqual(classifyPriority(claim({ highValue: false, itemValue: 5000 })), "normal");
  });

  it("should return urgent for a stolen-check evidence request", () => {
    assert.strictEqual(classifyPriority(evidence({ stolenCheck: true })), "urgent");
  });

  it("should return high for any other evidence request", () => {
    assert.strictEqual(classifyPriority(evidence({ stolenCheck: false })), "high");
  });

  it("should return high for an airport transfer from a secure area", () => {
    assert.strictEqual(classifyPriority(airport({ secureArea: true })), "high");
    assert.strictEqual(classifyPriority(airport({ secureArea: false })), "normal");
  });

  it("should return normal for variants without a hint", () => {
    assert.strictEqual(classifyPriority(transit()), "normal");
    assert.strictEqual(classifyPriority(dispute()), "normal");
  });

  it("should fall back to normal when the variant is not registered", () => {
    const onlyEvidence = createRegistry([policeEvidence]);
    assert.strictEqual(classifyPriority(claim({ highValue: true, itemValue: 5000 }), onlyEvidence), "normal");
    assert.strictEqual(classifyPriority(evidence({ stolenCheck: true }), onlyEvidence), "urgent");
  });

  it("should not change the stored priority", () => {
    const req = claim({ highValue: true, itemValue: 2500, priority: "low" });
    classifyPriority(req);
    assert.strictEqual(req.priority, "low");
  });
});

describe("slaHoursForPriority", () => {
  it("should map each priority to its target", () => {
    assert.deepStrictEqual(
      (["urgent", "high", "normal", "low"] as const).map(slaHoursForPriority),
      [4, 24, 72, 168]
    );
  });
});
