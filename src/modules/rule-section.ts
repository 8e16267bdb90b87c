/**
 * Rule section module.
 *
 * Emits one prompt section listing the rules of a category:
 *
 *   ### ESS rules
 *   - ESS-01: Essence, not purpose
 *   - ESS-02: Name the category
 *
 * Rules are sorted by id. A category without rules yields empty content,
 * which the assembler leaves out of the artifact.
 *
 * With a `focusKey`, the module consumes that shared-state key and names
 * its value in the heading (`### ESS rules (process)`), so the section
 * follows what an earlier wave decided about the term.
 */

import type { ModuleDescriptorInput } from "../config/pipeline/schema.js";
import type { ModuleDefinition } from "../pipeline/registry.js";
import type { RuleConfigStore, RuleRecord } from "../rules/index.js";
import {
  moduleSuccess,
  type ModuleContext,
  type ModuleOutput,
  type PromptModule,
} from "../types/module.js";

export interface RuleSectionOptions {
  category: string;
  store: RuleConfigStore;
  /** Defaults to `rules.<category>`. */
  id?: string;
  heading?: string;
  /** Append each rule's reviewer question on an indented line. */
  includeQuestions?: boolean;
  /** Shared-state key whose value is named in the heading; added to consumedKeys. */
  focusKey?: string;
  descriptor?: Omit<ModuleDescriptorInput, "id">;
}

export function formatRuleSection(
  heading: string,
  rules: readonly RuleRecord[],
  includeQuestions = false
): string {
  if (rules.length === 0) return "";

  const sorted = [...rules].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const lines = [heading];
  for (const rule of sorted) {
    lines.push(`- ${rule.id}: ${rule.name}`);
    if (includeQuestions && rule.question) {
      lines.push(`  ${rule.question}`);
    }
  }
  return lines.join("\n");
}

class RuleSectionModule implements PromptModule {
  constructor(
    private readonly category: string,
    private readonly store: RuleConfigStore,
    private readonly heading: string,
    private readonly includeQuestions: boolean,
    private readonly focusKey: string | undefined
  ) {}

  async execute(context: ModuleContext): Promise<ModuleOutput> {
    const rules = await this.store.rulesFor(this.category);
    const focus = this.focus(context);
    context.logger.debug("Rules loaded", { category: this.category, count: rules.length, focus });

    const heading = focus === undefined ? this.heading : `${this.heading} (${focus})`;
    return moduleSuccess(
      formatRuleSection(heading, rules, this.includeQuestions),
      undefined,
      { category: this.category, ruleCount: rules.length }
    );
  }

  /** The focus value, when its producer ran and left a non-empty string. */
  private focus(context: ModuleContext): string | undefined {
    if (this.focusKey === undefined) return undefined;
    const value = context.state.get(this.focusKey);
    // MISSING (producer failed or was skipped) is a symbol, so it lands here too.
    if (typeof value !== "string" || value.trim() === "") {
      return undefined;
    }
    return value;
  }
}

export function createRuleSectionModule(options: RuleSectionOptions): ModuleDefinition {
  const {
    category,
    store,
    id = `rules.${category}`,
    heading = `### ${category} rules`,
    includeQuestions = false,
    focusKey,
    descriptor = {},
  } = options;

  const consumedKeys = descriptor.consumedKeys ?? [];
  return {
    descriptor: {
      ...descriptor,
      id,
      ...(focusKey !== undefined &&
        !consumedKeys.includes(focusKey) && { consumedKeys: [...consumedKeys, focusKey] }),
    },
    factory: () => new RuleSectionModule(category, store, heading, includeQuestions, focusKey),
  };
}
