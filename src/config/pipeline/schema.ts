/**
 * Pipeline configuration schema.
 *
 * Module descriptors are static data: they are read once at startup,
 * validated here, and frozen. Sets (dependencies, produced and consumed
 * keys) are JSON arrays that must not repeat an entry.
 */

import { z } from "zod";

/** Module ids: letters, digits, `_`, `-`, `.`; starting with a letter. */
const ModuleIdSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_.-]*$/, "must start with a letter and use only letters, digits, _ . -");

const StateKeySchema = z.string().min(1, "shared-state keys must not be empty");

function uniqueArray<T extends z.ZodTypeAny>(item: T, label: string) {
  return z
    .array(item)
    .refine((values) => new Set(values).size === values.length, {
      message: `${label} must not contain duplicates`,
    })
    .default([]);
}

export const ModuleDescriptorSchema = z
  .object({
    id: ModuleIdSchema.describe("Unique module identifier"),

    name: z.string().min(1).optional().describe("Display name; defaults to the id"),

    priority: z
      .number()
      .int()
      .default(50)
      .describe("Assembly order: lower values are emitted earlier"),

    dependencies: uniqueArray(ModuleIdSchema, "dependencies").describe(
      "Modules that must finish in an earlier wave"
    ),

    producedKeys: uniqueArray(StateKeySchema, "producedKeys").describe(
      "Shared-state keys this module may write"
    ),

    consumedKeys: uniqueArray(StateKeySchema, "consumedKeys").describe(
      "Shared-state keys this module may read"
    ),

    required: z
      .boolean()
      .default(false)
      .describe("Whether a failure halts the run after the current wave"),

    timeoutMs: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe("Per-module timeout override in ms; 0 disables it"),
  })
  .strict()
  .transform((descriptor) => ({
    ...descriptor,
    name: descriptor.name ?? descriptor.id,
  }));

/** Descriptor as written in configuration (defaults not yet applied). */
export type ModuleDescriptorInput = z.input<typeof ModuleDescriptorSchema>;

export const PipelineConfigSchema = z
  .object({
    workerPoolSize: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe("Worker slots shared by every wave"),

    runTimeoutMs: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe("Run-level timeout in ms; 0 disables it"),

    moduleTimeoutMs: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe("Default per-module timeout in ms; 0 disables it"),

    modules: z.array(ModuleDescriptorSchema).describe("Module descriptors"),
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
