import { Category, Priority } from "../types/contracts.js";

export const presetId = "service_desk.v1";

export interface ClassificationRule {
  id: string;
  category: Category;
  priority: Priority;
  keywords: string[];
}

export interface SlaWindow {
  responseHours: number;
  resolutionHours: number;
}

export type SlaPolicy = Record<Priority, SlaWindow>;
export type TeamTable = Partial<Record<Category, string>> & { other: string };

// Ordered by severity: the first rule with a matching keyword wins.
export const classificationRules: ClassificationRule[] = [
  {
    id: "infra-outage",
    category: "infrastructure",
    priority: "high",
    keywords: ["outage", "server down", "production down", "unreachable", "down"]
  },
  {
    id: "network-connectivity",
    category: "network",
    priority: "medium",
    keywords: ["vpn", "cannot connect", "can't connect", "network", "wifi", "internet"]
  },
  {
    id: "email-delivery",
    category: "email",
    priority: "medium",
    keywords: ["outlook", "mailbox", "email", "inbox"]
  },
  {
    id: "hardware-device",
    category: "hardware",
    priority: "medium",
    keywords: ["laptop", "printer", "monitor", "keyboard", "mouse", "docking station"]
  },
  {
    id: "access-credentials",
    category: "access",
    priority: "low",
    keywords: ["password", "reset", "unlock", "locked out"]
  },
  {
    id: "software-request",
    category: "software",
    priority: "low",
    keywords: ["install", "software", "upgrade", "license"]
  }
];

export const fallbackClassification = { category: "other", priority: "low" } as const satisfies {
  category: Category;
  priority: Priority;
};

export const slaPolicy: SlaPolicy = {
  high: { responseHours: 1, resolutionHours: 4 },
  medium: { responseHours: 4, resolutionHours: 24 },
  low: { responseHours: 24, resolutionHours: 72 }
};

export const teams: TeamTable = {
  access: "identity-team@example.com",
  network: "network-team@example.com",
  infrastructure: "infra-team@example.com",
  email: "messaging-team@example.com",
  software: "desktop-team@example.com",
  hardware: "desktop-team@example.com",
  other: "helpdesk@example.com"
};

export function teamFor(category: Category, table: TeamTable = teams): string {
  return table[category] ?? table.other;
}
