import { Priority, WorkRequest } from "../types/contracts.js";
import { defaultVariants, VariantRegistry } from "../variants/index.js";

/**
 * Priority a request ought to carry, judged from its own attributes.
 * Advisory only; the request is left untouched.
 */
export function classifyPriority(req: WorkRequest, variants: VariantRegistry = defaultVariants): Priority {
  return variants.get(req.type)?.priorityHint(req) ?? "normal";
}

export function slaHoursForPriority(p: Priority): number {
  switch (p) {
    case "urgent": return 4;
    case "high":   return 24;
    case "normal": return 72;
    case "low":    return 168;
  }
}
