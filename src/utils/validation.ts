/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and emitted records at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Extraction Configuration Schema
// =============================================================================

/** Directories that never hold first-party sources in an Erlang checkout */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  "**/deps/**",
  "**/_build/**",
  "**/ebin/**",
  "**/priv/**",
  "**/.git/**",
  "**/node_modules/**",
];

/**
 * Extraction configuration schema
 */
export const ExtractionConfigSchema = z
  .object({
    /** Files larger than this are skipped */
    maxFileSizeBytes: z.number().int().positive().default(1024 * 1024),

    /** Files processed at once */
    concurrency: z.number().int().min(1).max(256).default(8),

    /** Per-file processing timeout */
    fileTimeoutMs: z.number().int().positive().default(30_000),

    /** Emit recursive-call edges as `dfg_approximate` */
    includeApproximateEdges: z.boolean().default(false),

    /** Stop scheduling files after the first file or group error */
    failFast: z.boolean().default(false),

    /** Source file extensions, with the leading dot */
    extensions: z
      .array(z.string().regex(/^\.[\w.-]+$/, "must start with '.'"))
      .min(1)
      .default([".erl"]),

    /** Glob patterns to exclude */
    excludePatterns: z.array(z.string()).default([...DEFAULT_EXCLUDE_PATTERNS]),

    /** Prefix for record ids */
    repositoryName: z.string().min(1).optional(),

    /** Base URL of the hosted repository */
    repositoryUrl: z.string().url().optional(),

    /** Revision used in record URLs */
    repositoryRef: z.string().min(1).default("HEAD"),
  })
  .strict();

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;

// =============================================================================
// Training Record Schema
// =============================================================================

const EdgeSchema = z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]);

/**
 * One emitted record. Edge endpoints must index into `code_tokens`.
 */
export const TrainingRecordSchema = z
  .object({
    idx: z.string().min(1),
    url: z.string().min(1),
    docstring: z.string(),
    code: z.string().min(1),
    code_tokens: z.array(z.string()).min(1),
    dfg: z.array(EdgeSchema),
    dfg_approximate: z.array(EdgeSchema).optional(),
  })
  .superRefine((record, ctx) => {
    const length = record.code_tokens.length;
    const checkEdges = (field: "dfg" | "dfg_approximate", edges: Array<[number, number]>): void => {
      edges.forEach((edge, index) => {
        for (const endpoint of edge) {
          if (endpoint >= length) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [field, index],
              message: `endpoint ${endpoint} is outside code_tokens (length ${length})`,
            });
          }
        }
      });
    };
    checkEdges("dfg", record.dfg);
    if (record.dfg_approximate) checkEdges("dfg_approximate", record.dfg_approximate);
  });

export type TrainingRecord = z.infer<typeof TrainingRecordSchema>;

// =============================================================================
// Documentation Map Schema
// =============================================================================

/**
 * Documentation file: `{"module:name/arity": "doc string"}`
 */
export const DocumentationMapSchema = z.record(
  z.string().regex(/^[^:]+:.+\/\d+$/, "key must be module:name/arity"),
  z.string()
);

export type DocumentationMap = z.infer<typeof DocumentationMapSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
