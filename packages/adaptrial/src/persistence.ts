import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { Staircase } from './staircase';
import { TrialSequence } from './trial-sequence';

const count = z.number().int().nonnegative();
const cursor = z.number().int().min(-1);

const trialSequenceSchema = z
  .object({
    name: z.string(),
    conditions: z.array(z.unknown()),
    nReps: z.number().int().positive(),
    trials: z.array(count),
    nTrials: count,
    nRemaining: count,
    thisN: cursor,
    thisRepN: count,
    thisTrialN: cursor,
    finished: z.boolean(),
  })
  .superRefine((state, ctx) => {
    if (state.trials.length !== state.nTrials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nTrials'],
        message: `expected ${state.trials.length} trials`,
      });
    }
    state.trials.forEach((i, k) => {
      if (i >= state.conditions.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['trials', k],
          message: `condition index ${i} is out of range`,
        });
      }
    });
    if (state.thisN > state.nTrials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thisN'],
        message: 'cursor is past the end of the sequence',
      });
    }
  });

const summarySchema = z.object({
  intensities: z.array(z.number()),
  percentCorrect: z.array(z.number()),
  responsesPerIntensity: z.array(count),
});
const staircaseSchema = z
  .object({
    options: z.object({
      start: z.number(),
      step: z.array(z.number().positive()).nonempty(),
      reversal: count,
      trials: count,
      up: z.number().int().positive(),
      down: z.number().int().positive(),
      stepType: z.enum(['db', 'log', 'lin']),
      min: z.number().optional(),
      max: z.number().optional(),
      name: z.string(),
    }),
    direction: z.enum(['up', 'down']),
    streak: z.object({ correct: z.boolean(), length: count }),
    stepSizeCurrent: z.number().positive(),
    nextIntensity: z.number(),
    thisTrialN: cursor,
    intensities: z.array(z.number()),
    responses: z.array(z.boolean()),
    reversalPoints: z.array(count),
    reversalIntensities: z.array(z.number()),
    finished: z.boolean(),
    psychometric: summarySchema.optional(),
  })
  .superRefine((state, ctx) => {
    if (state.intensities.length !== state.thisTrialN + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['intensities'],
        message: `expected ${state.thisTrialN + 1} intensities`,
      });
    }
    if (state.responses.length > state.intensities.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['responses'],
        message: 'more responses than presented trials',
      });
    }
    if (state.reversalPoints.length !== state.reversalIntensities.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reversalIntensities'],
        message: 'reversal points and intensities differ in length',
      });
    }
  });

function check<T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new Error(`Malformed ${kind} document: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}
function parseDocument<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string,
): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new Error(`The ${kind} document is not valid JSON`, { cause: error });
  }
  return check(json, schema, kind);
}

/** Pretty JSON of the whole iterator state */
export const stringifyState = (iterator: TrialSequence<unknown> | Staircase) =>
  JSON.stringify(iterator.getState(), null, 2);

export async function saveJSON(
  filename: string,
  iterator: TrialSequence<unknown> | Staircase,
) {
  try {
    await writeFile(filename, stringifyState(iterator), 'utf8');
  } catch (error) {
    throw new Error(`Cannot write ${filename}`, { cause: error });
  }
}
async function read(filename: string) {
  try {
    return await readFile(filename, 'utf8');
  } catch (error) {
    throw new Error(`Cannot read ${filename}`, { cause: error });
  }
}

/**
 * Rebuild a trial sequence from its JSON document
 *
 * @param condition Schema of a single condition, to get typed conditions back
 */
export function parseTrialSequence(text: string): TrialSequence<unknown>;
export function parseTrialSequence<T>(
  text: string,
  condition: z.ZodType<T, z.ZodTypeDef, unknown>,
): TrialSequence<T>;
export function parseTrialSequence(
  text: string,
  condition: z.ZodType<unknown, z.ZodTypeDef, unknown> = z.unknown(),
) {
  const state = parseDocument(text, trialSequenceSchema, 'trial sequence');
  const conditions = check(state.conditions, z.array(condition), 'condition');
  return TrialSequence.fromState({ ...state, conditions });
}
export function parseStaircase(text: string) {
  return Staircase.fromState(parseDocument(text, staircaseSchema, 'staircase'));
}

export function loadTrialSequence(
  filename: string,
): Promise<TrialSequence<unknown>>;
export function loadTrialSequence<T>(
  filename: string,
  condition: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<TrialSequence<T>>;
export async function loadTrialSequence(
  filename: string,
  condition: z.ZodType<unknown, z.ZodTypeDef, unknown> = z.unknown(),
) {
  return parseTrialSequence(await read(filename), condition);
}
export async function loadStaircase(filename: string) {
  return parseStaircase(await read(filename));
}

/**
 * Presented intensities and 0/1 responses as two comma separated rows
 *
 * @example
 *
 * ```ts
 * toCSV(staircase); // '50, 42, 34\n1, 1, 0'
 * ```
 */
export function toCSV(staircase: Staircase) {
  return [
    staircase.intensities.join(', '),
    staircase.responses.map(Number).join(', '),
  ].join('\n');
}
export async function saveCSV(filename: string, staircase: Staircase) {
  if (staircase.intensities.length === 0) {
    throw new Error(`No trials to save to ${filename}`);
  }
  try {
    await writeFile(filename, toCSV(staircase), 'utf8');
  } catch (error) {
    throw new Error(`Cannot write ${filename}`, { cause: error });
  }
}
