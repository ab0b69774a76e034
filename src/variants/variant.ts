import { Priority, RequestOf, RequestType, Role, WorkRequest } from "../types/contracts.js";

export interface VariantSpec<R extends WorkRequest> {
  /** Roles that must approve, in order. */
  approvalChain(req: R): Role[];
  /** Urgency this variant asks for, or null when it has no opinion. */
  priorityHint(req: R): Priority | null;
  summary(req: R): string;
}

export interface RequestVariant {
  type: RequestType;
  approvalChain(req: WorkRequest): Role[];
  priorityHint(req: WorkRequest): Priority | null;
  summary(req: WorkRequest): string;
}

export type VariantRegistry = ReadonlyMap<string, RequestVariant>;

/**
 * Wraps a variant's typed behaviour so it can sit in a registry next to the
 * other variants. A request of another type gets the neutral answer.
 */
export function defineVariant<T extends RequestType>(type: T, spec: VariantSpec<RequestOf<T>>): RequestVariant {
  const owns = (req: WorkRequest): req is RequestOf<T> => req.type === type;
  return {
    type,
    approvalChain: (req) => (owns(req) ? spec.approvalChain(req) : []),
    priorityHint: (req) => (owns(req) ? spec.priorityHint(req) : null),
    summary: (req) => (owns(req) ? spec.summary(req) : `Request ${req.id}`)
  };
}

export function createRegistry(variants: RequestVariant[]): VariantRegistry {
  return new Map(variants.map((v) => [v.type, v]));
}
