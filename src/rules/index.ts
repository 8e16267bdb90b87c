/**
 * Validation rules, grouped by category and loaded once per process.
 */

export {
  RuleCategorySchema,
  RuleRecordSchema,
  RuleFileSchema,
  RulePriority,
  type RuleRecord,
  type RuleFile,
} from "./schema.js";
export { RuleConfigStore, RuleLoadError, type RuleStoreOptions } from "./store.js";
