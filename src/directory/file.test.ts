import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileDirectory } from "./file.js";

describe("FileDirectory", () => {
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "directory_test_"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should load and normalize approvers from a JSON file", async () => {
    const file = path.join(tmpDir, "approvers.json");
    fs.writeFileSync(file, JSON.stringify([
      { id: 7, name: "Casey Coordinator", role: "CAMPUS_COORDINATOR", organizationId: "neu" },
      { id: "p-1", name: "Pat Police", role: "POLICE_EVIDENCE_CUSTODIAN" }
    ]));

    const dir = new FileDirectory(file);
    await dir.init();
    const approvers = await dir.listApprovers();

    assert.deepStrictEqual(approvers, [
      { id: "7", name: "Casey Coordinator", role: "CAMPUS_COORDINATOR", organizationId: "neu" },
      { id: "p-1", name: "Pat Police", role: "POLICE_EVIDENCE_CUSTODIAN", organizationId: null }
    ]);
  });

  it("should be empty when the file does not exist", async () => {
    const dir = new FileDirectory(path.join(tmpDir, "missing.json"));
    await dir.init();
    assert.deepStrictEqual(await dir.listApprovers(), []);
  });

  it("should reject an approver with an unknown role", async () => {
    const file = path.join(tmpDir, "bad.json");
    fs.writeFileSync(file, JSON.stringify([{ id: "x", name: "X", role: "WIZARD" }]));
    const dir = new FileDirectory(file);
    await assert.rejects(dir.init(), { name: "ZodError" });
  });

  it("should pick up changes on reload", async () => {
    const file = path.join(tmpDir, "reload.json");
    fs.writeFileSync(file, "[]");
    const dir = new FileDirectory(file);
    await dir.init();
    assert.strictEqual((await dir.listApprovers()).length, 0);

    fs.writeFileSync(file, JSON.stringify([{ id: "s1", name: "Sky", role: "STATION_MANAGER", organizationId: "mbta" }]));
    await dir.reload();
    assert.deepStrictEqual((await dir.listApprovers()).map((a) => a.id), ["s1"]);
  });
});
