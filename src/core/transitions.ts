import { Priority, Status } from "../types/contracts.js";

const allowed: Record<Status, Status[]> = {
  new: ["assigned", "escalated", "auto_resolved"],
  assigned: ["escalated", "resolved"],
  escalated: ["resolved"],
  auto_resolved: [],
  resolved: []
};

export const TERMINAL_STATUSES: readonly Status[] = ["auto_resolved", "resolved"];

export function canTransition(from: Status, to: Status): boolean {
  return allowed[from].includes(to);
}

export function isTerminal(status: Status): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// Where a freshly classified ticket lands.
export function creationStatus(priority: Priority): Status {
  switch (priority) {
    case "low": return "auto_resolved";
    case "medium": return "assigned";
    case "high": return "escalated";
  }
}
