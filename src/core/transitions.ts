import { Status } from "../types/contracts.js";

const allowed: Record<Status, Status[]> = {
  pending: ["in_progress", "approved", "rejected", "cancelled"],
  in_progress: ["approved", "rejected", "cancelled"],
  approved: ["completed", "cancelled"],
  rejected: [],
  completed: [],
  cancelled: []
};

export function canTransition(from: Status, to: Status): boolean {
  return allowed[from].includes(to);
}
