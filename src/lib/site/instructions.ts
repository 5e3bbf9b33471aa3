import type { TransformationKind, TransformationType } from "@/lib/types";

export interface InstructionRule {
  type: Exclude<TransformationType, "regenerate">;
  keywords: readonly string[]; // lowercase, matched as substrings
}

/**
 * Ordered keyword cascade. First rule with a keyword contained in the
 * lowercased instruction wins; order is the only tie-breaker.
 */
export const INSTRUCTION_RULES: readonly InstructionRule[] = [
  { type: "sci_fi_theme", keywords: ["sci-fi", "sci fi"] },
  { type: "dark_mode", keywords: ["make it dark", "dark mode"] },
  { type: "add_pricing", keywords: ["add pricing", "pricing"] },
  { type: "accent_recolor", keywords: ["change accent", "make it crimson", "crimson"] },
];

export function matchRule(rule: InstructionRule, instruction: string): string | null {
  const text = instruction.toLowerCase();
  return rule.keywords.find((keyword) => text.includes(keyword)) ?? null;
}

export function classifyInstruction(instruction: string): TransformationKind {
  for (const rule of INSTRUCTION_RULES) {
    const keyword = matchRule(rule, instruction);
    if (keyword !== null) {
      return { type: rule.type, keyword };
    }
  }
  return { type: "regenerate", keyword: null };
}
