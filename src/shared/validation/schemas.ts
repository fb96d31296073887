import { z } from 'zod';
import { isAdjacentTo, parseStep, type Position } from '../engine/geometry';
import { DEFAULT_HINT_THRESHOLD } from '../engine/rulesConfig';
import { Strand } from '../engine/strand';
import type { Dictionary } from '../engine/types';

// Position validation. Strands are board-agnostic, so negative coordinates
// are allowed here; the board rejects them on evaluation.
export const PositionSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export const StepNameSchema = z.string().transform((value, ctx) => {
  const step = parseStep(value);
  if (step === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown step "${value}"`,
    });
    return z.NEVER;
  }
  return step;
});

/**
 * Strand payload as sent by a UI: either a start cell plus step names, or
 * the explicit list of cells the player traced.
 */
export const StrandPayloadSchema = z.union([
  z.object({
    start: PositionSchema,
    steps: z.array(StepNameSchema).default([]),
  }),
  z.object({
    path: z.array(PositionSchema).min(1, 'Path must contain at least one position'),
  }),
]);

export type StrandPayload = z.input<typeof StrandPayloadSchema>;

const DictionarySchema = z.custom<Dictionary>(
  (value) =>
    typeof value === 'object' && value !== null && 'contains' in value && typeof value.contains === 'function',
  { message: 'dictionary must expose contains(word)' }
);

// Engine options
export const GameOptionsSchema = z.object({
  hintThreshold: z.number().int().min(0).default(DEFAULT_HINT_THRESHOLD),
  dictionary: DictionarySchema.optional(),
});

export type GameOptionsInput = z.input<typeof GameOptionsSchema>;
export type GameOptions = z.output<typeof GameOptionsSchema>;

export interface SchemaIssue {
  path: string;
  message: string;
}

export type SchemaResult<T> = { success: true; data: T } | { success: false; errors: SchemaIssue[] };

export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Validate an untrusted strand payload and build the strand it describes.
 * Path payloads whose cells are not neighbours are reported as issues
 * rather than thrown.
 */
export function parseStrandPayload(input: unknown): SchemaResult<Strand> {
  const result = StrandPayloadSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: toSchemaIssues(result.error) };
  }

  const payload = result.data;
  if ('start' in payload) {
    return { success: true, data: new Strand(payload.start, payload.steps) };
  }

  const path: Position[] = payload.path;
  for (let i = 1; i < path.length; i++) {
    if (!isAdjacentTo(path[i - 1], path[i])) {
      return {
        success: false,
        errors: [{ path: `path.${i}`, message: 'Position is not adjacent to the previous one' }],
      };
    }
  }
  return { success: true, data: Strand.fromPositions(path) };
}
