/**
 * Validation rule schema.
 *
 * Rules are grouped by category; each category lives in its own file,
 * `<rulesDir>/<CATEGORY>.json`:
 *
 *   {
 *     "category": "ESS",
 *     "rules": [
 *       { "id": "ESS-01", "name": "Essence, not purpose", ... }
 *     ]
 *   }
 */

import { z } from "zod";

/** Upper-case category codes such as ARAI, CON, ESS, INT, SAM, STR, VER. */
export const RuleCategorySchema = z
  .string()
  .regex(/^[A-Z]+$/, "must be an upper-case category code");

export const RulePriority = z.enum(["high", "medium", "low"]);
export type RulePriority = z.infer<typeof RulePriority>;

export const RuleRecordSchema = z
  .object({
    id: z.string().min(1).describe("Rule identifier, e.g. ESS-01"),
    name: z.string().min(1).describe("Short rule title"),
    priority: RulePriority.default("medium"),
    explanation: z.string().optional().describe("What the rule checks"),
    question: z.string().optional().describe("Question a reviewer asks"),
    goodExamples: z.array(z.string()).default([]),
    badExamples: z.array(z.string()).default([]),
  })
  .strict();

export type RuleRecord = z.infer<typeof RuleRecordSchema>;

export const RuleFileSchema = z
  .object({
    category: RuleCategorySchema,
    rules: z.array(RuleRecordSchema),
  })
  .strict()
  .refine((file) => new Set(file.rules.map((r) => r.id)).size === file.rules.length, {
    message: "rule ids must be unique within a category",
    path: ["rules"],
  });

export type RuleFile = z.infer<typeof RuleFileSchema>;
