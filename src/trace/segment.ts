// Segment helpers: validation and conversion between segments and cycle vectors

import { TraceError, TraceErrorType } from '../errors.js';
import type { CycleVector, Segment } from '../types/trace.js';

export interface CycleLocation {
  segment: number;
  cycle: number;
}

/**
 * Check a segment's declared cycle count against every signal array
 */
export function validateSegment(segment: Segment, index: number): void {
  if (!Number.isInteger(segment.clockCycles) || segment.clockCycles < 0) {
    throw new TraceError(
      TraceErrorType.SEGMENT_LENGTH_MISMATCH,
      `Segment ${index}: clock cycles ${segment.clockCycles} is not a non-negative integer`
    );
  }
  for (const [name, values] of Object.entries(segment.signals)) {
    if (values.length !== segment.clockCycles) {
      throw new TraceError(
        TraceErrorType.SEGMENT_LENGTH_MISMATCH,
        `Segment ${index}: declares ${segment.clockCycles} clock cycles but '${name}' has ${values.length} values`
      );
    }
  }
}

export function segmentCycles(segment: Segment): CycleVector[] {
  const cycles: CycleVector[] = [];
  for (let i = 0; i < segment.clockCycles; i++) {
    const vector: CycleVector = {};
    for (const [name, values] of Object.entries(segment.signals)) {
      vector[name] = values[i];
    }
    cycles.push(vector);
  }
  return cycles;
}

/**
 * Validate every segment, then concatenate them into one cycle sequence
 */
export function flattenSegments(segments: readonly Segment[]): CycleVector[] {
  segments.forEach(validateSegment);
  return segments.flatMap(segmentCycles);
}

/**
 * Segment index and in-segment cycle for every absolute cycle
 */
export function cycleLocations(segments: readonly Segment[]): CycleLocation[] {
  const locations: CycleLocation[] = [];
  segments.forEach((segment, index) => {
    for (let cycle = 0; cycle < segment.clockCycles; cycle++) {
      locations.push({ segment: index, cycle });
    }
  });
  return locations;
}

/**
 * Gather per-cycle vectors back into one segment
 */
export function toSegment(vectors: readonly CycleVector[], names: readonly string[]): Segment {
  const signals: Record<string, string[]> = {};
  for (const name of names) {
    signals[name] = vectors.map((vector) => vector[name]);
  }
  return { clockCycles: vectors.length, signals };
}
