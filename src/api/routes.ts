import { Response, Router } from "express";
import { z } from "zod";
import { RequestStore } from "../store/store.js";
import { RouteResult, Workflow, WorkflowResult } from "../plugin/createWorkflow.js";
import { HttpError, statusForError } from "./errors.js";
import { roles, statuses } from "../types/contracts.js";

const StatusEnum = z.enum(statuses);

function send(res: Response, out: WorkflowResult | RouteResult) {
  if (!out.ok) {
    res.status(statusForError[out.error]).json(out);
    return;
  }
  res.json(out);
}

export function makeRoutes(args: { store: RequestStore; workflow: Workflow }) {
  const r = Router();
  const { store, workflow } = args;

  r.get("/health", async (_req, res) => {
    res.json({ ok: true });
  });

  r.post("/requests", async (req, res) => {
    const out = await workflow.submit(req.body);
    res.status(201).json(out);
  });

  r.get("/requests", async (req, res) => {
    const status = req.query.status ? StatusEnum.parse(req.query.status) : undefined;

    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(500).parse(req.query.limit)
      : 50;

    const offset = req.query.offset
      ? z.coerce.number().int().min(0).parse(req.query.offset)
      : 0;

    const items = await store.listRequests({ status, limit, offset });
    res.json({ ok: true, items });
  });

  r.get("/requests/:id", async (req, res) => {
    const item = await store.getRequest(req.params.id);
    if (!item) throw new HttpError(404, "not_found");
    res.json({ ok: true, item });
  });

  r.get("/requests/:id/events", async (req, res) => {
    const limit = req.query.limit
      ? z.coerce.number().int().min(1).max(1000).parse(req.query.limit)
      : 200;

    const events = await store.listAudit(req.params.id, limit);
    res.json({ ok: true, events });
  });

  r.post("/requests/:id/route", async (req, res) => {
    send(res, await workflow.route(req.params.id));
  });

  r.post("/requests/:id/approve", async (req, res) => {
    const approverId = z.string().min(1).parse(req.body?.approverId);
    send(res, await workflow.approve(req.params.id, approverId));
  });

  r.post("/requests/:id/reject", async (req, res) => {
    const body = z.object({ approverId: z.string().min(1), reason: z.string().min(1) }).parse(req.body);
    send(res, await workflow.reject(req.params.id, body.approverId, body.reason));
  });

  r.post("/requests/:id/complete", async (req, res) => {
    send(res, await workflow.complete(req.params.id));
  });

  r.post("/requests/:id/cancel", async (req, res) => {
    const requesterId = z.string().min(1).parse(req.body?.requesterId);
    send(res, await workflow.cancel(req.params.id, requesterId));
  });

  r.get("/sla/overdue", async (_req, res) => {
    res.json({ ok: true, items: await workflow.overdue() });
  });

  r.get("/sla/approaching", async (_req, res) => {
    res.json({ ok: true, items: await workflow.approaching() });
  });

  r.get("/queue", async (req, res) => {
    const q = z
      .object({ role: z.enum(roles), organizationId: z.string().min(1).optional() })
      .parse(req.query);
    res.json({ ok: true, items: await workflow.queueForRole(q.role, q.organizationId) });
  });

  r.get("/approvers/:id/queue", async (req, res) => {
    const items = await workflow.queueForApprover(req.params.id);
    res.json({ ok: true, pending: items.length, items });
  });

  r.get("/stats", async (_req, res) => {
    res.json({ ok: true, stats: await workflow.stats() });
  });

  r.get("/workload", async (_req, res) => {
    res.json({ ok: true, workload: workflow.workload() });
  });

  r.post("/workload/reset", async (_req, res) => {
    workflow.resetWorkload();
    res.json({ ok: true });
  });

  return r;
}
