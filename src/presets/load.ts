import fs from "node:fs";
import { z } from "zod";
import { CATEGORIES, PRIORITIES } from "../types/contracts.js";
import { DeskPolicy, resolvePolicy } from "../core/engine.js";

const RuleSchema = z.object({
  id: z.string().min(1),
  category: z.enum(CATEGORIES),
  priority: z.enum(PRIORITIES),
  keywords: z.array(z.string().trim().toLowerCase().min(1)).min(1)
});

const WindowSchema = z.object({
  responseHours: z.number().positive(),
  resolutionHours: z.number().positive()
});

export const PolicyFileSchema = z.object({
  rules: z
    .array(RuleSchema)
    .min(1)
    .refine(rules => new Set(rules.map(r => r.id)).size === rules.length, "rule ids must be unique")
    .optional(),
  sla: z.object({ high: WindowSchema, medium: WindowSchema, low: WindowSchema }).optional(),
  teams: z
    .object({
      access: z.string().min(1).optional(),
      network: z.string().min(1).optional(),
      infrastructure: z.string().min(1).optional(),
      email: z.string().min(1).optional(),
      software: z.string().min(1).optional(),
      hardware: z.string().min(1).optional(),
      other: z.string().min(1)
    })
    .optional()
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;

/**
 * Builds the desk policy from the built-in preset, replacing whichever of
 * rules, sla and teams the JSON file at `filePath` provides.
 */
export function loadPolicy(filePath: string | null, warningRatio?: number): DeskPolicy {
  if (!filePath) return resolvePolicy({ warningRatio });

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(`cannot read rules file ${filePath}`, { cause: err });
  }
  const file = PolicyFileSchema.parse(raw);
  return resolvePolicy({ rules: file.rules, sla: file.sla, teams: file.teams, warningRatio });
}
