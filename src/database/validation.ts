/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. Turns are stored
 * with JSON columns, so the payload schemas here also guard what comes
 * back out of those columns.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM sessions WHERE id = ?').get(id);
 * return row ? validateRow(SessionRowSchema, row, `sessions.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';

import { CLIError } from '../errors/types.js';
import { IntentSchema } from '../agent/types.js';

// ============================================================================
// Payload Schemas (JSON columns)
// ============================================================================

export const ConstraintPredicateSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('range'),
    min: z.number().optional(),
    max: z.number().optional(),
  }),
  z.object({ kind: z.literal('oneOf'), values: z.array(z.string()) }),
  z.object({ kind: z.literal('contains'), values: z.array(z.string()) }),
]);

export const ConstraintsSchema = z.record(ConstraintPredicateSchema);

export const EvidenceItemSchema = z.object({
  sourceId: z.string(),
  sourceKind: z.enum(['catalog', 'document', 'web']),
  score: z.number(),
  excerpt: z.string(),
  metadata: z.record(z.unknown()),
});

export const EvidenceBundleSchema = z.object({
  agent: z.enum(['catalog', 'document', 'general-knowledge']),
  items: z.array(EvidenceItemSchema),
  degraded: z.boolean(),
  fallback: z.boolean(),
  relaxation: z.enum(['none', 'single', 'unconstrained']),
  unavailableSources: z.array(z.string()),
  notes: z.array(z.string()),
});

export const CitationsSchema = z.array(z.string());

// ============================================================================
// Row Schemas
// ============================================================================

export const SessionRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  created_at: z.string(),
  last_active_at: z.string(),
  turn_count: z.number().int().nonnegative(),
});

export type SessionRow = z.infer<typeof SessionRowSchema>;

export const TurnRowSchema = z.object({
  session_id: z.string(),
  seq: z.number().int().nonnegative(),
  query: z.string(),
  intent: IntentSchema,
  constraints: z.string(),
  evidence: z.string(),
  answer: z.string(),
  citations: z.string(),
  agent_used: z.string(),
  timestamp: z.string(),
  trace_id: z.string().nullable(),
});

export type TurnRow = z.infer<typeof TurnRowSchema>;

export const MigrationRowSchema = z.object({
  name: z.string(),
  applied_at: z.string(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * This indicates schema drift - the database has data that doesn't match
 * what the code expects (failed migration, manual edits, version mismatch).
 *
 * Exit code 5: Database error (same as DatabaseError for consistency)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try moving the history database aside and asking again`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single value against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "sessions.id=abc")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows, throwing on the first invalid one.
 *
 * @throws SchemaValidationError naming the failing index
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  for (let i = 0; i < rows.length; i++) {
    const result = schema.safeParse(rows[i]);

    if (result.success) {
      valid.push(result.data);
    } else {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  }

  return valid;
}

/**
 * Parse a JSON column and validate it.
 *
 * @throws SchemaValidationError for malformed JSON or a shape mismatch
 */
export function parseJsonColumn<T extends z.ZodSchema>(
  schema: T,
  text: string,
  context: string
): z.output<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaValidationError(`Malformed JSON in ${context}`, [
      { code: 'custom', path: [], message },
    ]);
  }
  return validateRow(schema, parsed, context);
}
