import { nanoid } from "nanoid";
import { AuditEvent } from "../types/contracts.js";
import { nowUtc } from "../lib/_util.js";

export function makeAudit(args: {
  requestId: string;
  type: string;
  actor?: string;
  payload?: Record<string, unknown>;
  at?: string;
}): AuditEvent {
  return {
    id: nanoid(),
    requestId: args.requestId,
    type: args.type,
    actor: args.actor ?? "system",
    payload: args.payload ?? {},
    at: args.at ?? nowUtc()
  };
}
