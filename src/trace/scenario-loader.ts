// Scenario loader: JSON trace documents into Scenario objects
//
// A document is one scenario object or an array of them:
//
//   { "scenario": "BasicShiftOperation",
//     "input variable":  [{ "clock cycles": 4, "shift_ena": ["1", "1", "1", "1"], ... }],
//     "output variable": [{ "clock cycles": 4, "q": ["0001", "0010", "0101", "1011"] }] }
//
// A segment without "clock cycles" is a single cycle whose values are
// plain strings, e.g. { "j": "1", "k": "0", "areset": "0" }.

import { z } from 'zod';
import { TraceError, TraceErrorType } from '../errors.js';
import type { Scenario, Segment } from '../types/trace.js';

export const CLOCK_CYCLES = 'clock cycles';

const SegmentSchema = z
  .record(z.union([z.number(), z.string(), z.array(z.string())]))
  .transform((raw, ctx): Segment => {
    const signals: Record<string, string[]> = {};

    if (!(CLOCK_CYCLES in raw)) {
      for (const [name, value] of Object.entries(raw)) {
        if (typeof value !== 'string') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [name],
            message: 'per-cycle vectors take one bit string per signal',
          });
          return z.NEVER;
        }
        signals[name] = [value];
      }
      return { clockCycles: 1, signals };
    }

    const count = raw[CLOCK_CYCLES];
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [CLOCK_CYCLES],
        message: 'must be a non-negative integer',
      });
      return z.NEVER;
    }

    for (const [name, value] of Object.entries(raw)) {
      if (name === CLOCK_CYCLES) continue;
      if (!Array.isArray(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: 'must be an array of bit strings',
        });
        return z.NEVER;
      }
      signals[name] = value;
    }
    // Lengths are checked when the scenario is evaluated, so one bad
    // segment only affects its own scenario
    return { clockCycles: count, signals };
  });

const ScenarioSchema = z
  .object({
    scenario: z.string().min(1),
    'input variable': z.array(SegmentSchema),
    'output variable': z.array(SegmentSchema).optional(),
  })
  .transform((raw): Scenario => ({
    name: raw.scenario,
    inputs: raw['input variable'],
    outputs: raw['output variable'],
  }));

const DocumentSchema = z.union([z.array(ScenarioSchema), ScenarioSchema]);

/**
 * Validate an already-parsed JSON document
 */
export function parseScenarios(document: unknown): Scenario[] {
  const parsed = DocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new TraceError(TraceErrorType.INVALID_TRACE, `Invalid scenario document: ${issues.join('; ')}`);
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

export function loadScenarios(text: string): Scenario[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new TraceError(TraceErrorType.INVALID_TRACE, `Scenario document is not valid JSON: ${detail}`);
  }
  return parseScenarios(document);
}

/**
 * Inverse of the loader, in the "clock cycles" form
 */
export function toScenarioDocument(scenario: Scenario): Record<string, unknown> {
  const document: Record<string, unknown> = {
    scenario: scenario.name,
    'input variable': scenario.inputs.map(toSegmentDocument),
  };
  if (scenario.outputs) {
    document['output variable'] = scenario.outputs.map(toSegmentDocument);
  }
  return document;
}

function toSegmentDocument(segment: Segment): Record<string, number | string[]> {
  return { [CLOCK_CYCLES]: segment.clockCycles, ...segment.signals };
}
