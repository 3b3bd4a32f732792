import { Category, Priority, RawMessage } from "../types/contracts.js";
import { normalizeText } from "./normalize.js";
import {
  ClassificationRule,
  classificationRules,
  fallbackClassification
} from "../presets/service-desk.v1.js";

export interface Classification {
  category: Category;
  priority: Priority;
  ruleId: string | null;
  fallback: boolean;
}

const matchers = new WeakMap<ClassificationRule, RegExp[]>();

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function matchersOf(rule: ClassificationRule): RegExp[] {
  let compiled = matchers.get(rule);
  if (!compiled) {
    compiled = rule.keywords.map(k => new RegExp(`(^|[^a-z0-9])${escapeRegExp(normalizeText(k))}($|[^a-z0-9])`));
    matchers.set(rule, compiled);
  }
  return compiled;
}

export function classificationText(message: Pick<RawMessage, "subject" | "body">): string {
  return normalizeText(`${message.subject}\n${message.body}`);
}

export function classify(
  message: Pick<RawMessage, "subject" | "body">,
  rules: readonly ClassificationRule[] = classificationRules
): Classification {
  const text = classificationText(message);
  for (const rule of rules) {
    if (matchersOf(rule).some(re => re.test(text))) {
      return { category: rule.category, priority: rule.priority, ruleId: rule.id, fallback: false };
    }
  }
  return { ...fallbackClassification, ruleId: null, fallback: true };
}
