import fs from "node:fs";
import path from "node:path";
import { RequestStore } from "./store.js";
import { AuditEvent, Status, WorkRequest } from "../types/contracts.js";
import { appendJsonl, ensureDir, readJsonl } from "../lib/_util.js";

/**
 * Append-only JSONL store. Every save writes the full request as a new line;
 * on load the last line for an id wins.
 */
export class FileStore implements RequestStore {
  private requestsPath: string;
  private auditPath: string;

  private byId = new Map<string, WorkRequest>();
  private auditByRequest = new Map<string, AuditEvent[]>();

  constructor(private dir: string) {
    this.requestsPath = path.join(dir, "requests.jsonl");
    this.auditPath = path.join(dir, "audit.jsonl");
  }

  async init(): Promise<void> {
    ensureDir(this.dir);
    if (!fs.existsSync(this.requestsPath)) fs.writeFileSync(this.requestsPath, "", "utf8");
    if (!fs.existsSync(this.auditPath)) fs.writeFileSync(this.auditPath, "", "utf8");

    this.byId.clear();
    for (const req of readJsonl<WorkRequest>(this.requestsPath)) this.byId.set(req.id, req);

    this.auditByRequest.clear();
    for (const ev of readJsonl<AuditEvent>(this.auditPath)) this.pushAudit(ev);
  }

  private pushAudit(ev: AuditEvent) {
    const arr = this.auditByRequest.get(ev.requestId) ?? [];
    arr.push(ev);
    this.auditByRequest.set(ev.requestId, arr);
  }

  async createRequest(req: WorkRequest): Promise<void> {
    await this.saveRequest(req);
  }

  async getRequest(id: string): Promise<WorkRequest | null> {
    return this.byId.get(id) ?? null;
  }

  async listRequests(q: { status?: Status; limit?: number; offset?: number } = {}): Promise<WorkRequest[]> {
    const limit = Math.min(q.limit ?? 50, 500);
    const offset = q.offset ?? 0;

    return [...this.byId.values()]
      .filter((r) => !q.status || r.status === q.status)
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .slice(offset, offset + limit);
  }

  async allRequests(): Promise<WorkRequest[]> {
    return [...this.byId.values()];
  }

  async saveRequest(req: WorkRequest): Promise<void> {
    appendJsonl(this.requestsPath, req);
    this.byId.set(req.id, req);
  }

  async appendAudit(ev: AuditEvent): Promise<void> {
    appendJsonl(this.auditPath, ev);
    this.pushAudit(ev);
  }

  async listAudit(requestId: string, limit: number = 200): Promise<AuditEvent[]> {
    const arr = this.auditByRequest.get(requestId) ?? [];
    return arr.slice(Math.max(0, arr.length - Math.min(limit, 1000)));
  }
}
