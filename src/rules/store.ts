/**
 * Read-only rule provider.
 *
 * Each category file is read at most once per process: loads go through
 * the CacheLayer with an infinite TTL, so concurrent modules asking for
 * the same category share one read.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { config } from "../config/index.js";
import { CacheLayer, getSharedCache } from "../pipeline/cache.js";
import { ComputationFailedError } from "../pipeline/errors.js";
import { RuleCategorySchema, RuleFileSchema, type RuleRecord } from "./schema.js";

export class RuleLoadError extends Error {
  constructor(
    public readonly category: string,
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = "RuleLoadError";
  }

  format(): string {
    const lines = [`Rule category ${this.category} could not be loaded: ${this.message}`];
    for (const issue of this.issues) {
      lines.push(`  - ${issue}`);
    }
    return lines.join("\n");
  }
}

export interface RuleStoreOptions {
  rulesDir?: string;
  cache?: CacheLayer;
}

export class RuleConfigStore {
  readonly rulesDir: string;
  private readonly cache: CacheLayer;

  constructor(options: RuleStoreOptions = {}) {
    this.rulesDir = options.rulesDir ?? config.rulesDir;
    this.cache = options.cache ?? getSharedCache();
  }

  static cacheKey(category: string): string {
    return `rules:${category}`;
  }

  /**
   * Rules of one category, in file order.
   *
   * @throws RuleLoadError for an unknown category code, a missing file,
   *         malformed JSON or schema violations
   */
  async rulesFor(category: string): Promise<readonly RuleRecord[]> {
    if (!RuleCategorySchema.safeParse(category).success) {
      throw new RuleLoadError(category, "invalid category code");
    }

    try {
      return await this.cache.getOrCompute(
        RuleConfigStore.cacheKey(category),
        () => this.load(category),
        Infinity
      );
    } catch (err) {
      if (err instanceof ComputationFailedError && err.cause instanceof RuleLoadError) {
        throw err.cause;
      }
      throw err;
    }
  }

  private load(category: string): readonly RuleRecord[] {
    const filePath = join(this.rulesDir, `${category}.json`);
    if (!existsSync(filePath)) {
      throw new RuleLoadError(category, `rule file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new RuleLoadError(
        category,
        `rule file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const result = RuleFileSchema.safeParse(raw);
    if (!result.success) {
      throw new RuleLoadError(
        category,
        `${result.error.issues.length} validation error(s)`,
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
        )
      );
    }
    if (result.data.category !== category) {
      throw new RuleLoadError(
        category,
        `file declares category ${result.data.category}`
      );
    }

    return Object.freeze(result.data.rules.map((rule) => Object.freeze(rule)));
  }
}
