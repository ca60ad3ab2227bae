// Verdict types produced by the consistency checker and orchestrator

import type { TraceErrorType } from '../errors.js';

export interface Mismatch {
  segment: number;          // Expected-output segment index
  cycle: number;            // Cycle within that segment
  absoluteCycle: number;    // Cycle across the whole scenario, 0-based
  signal: string;
  expected: string;
  actual: string;
  reason: string;
}

export interface MatchResult {
  status: 'match';
  matches: true;
  cycles: number;
  ambiguousCycles: number[];  // Cycles accepted through an ambiguity exemption
}

export interface MismatchResult {
  status: 'mismatch';
  matches: false;
  cycles: number;
  ambiguousCycles: number[];
  firstMismatch: Mismatch;
}

export type CheckResult = MatchResult | MismatchResult;

export interface InconclusiveResult {
  status: 'inconclusive';
  matches: false;
  error: { type: TraceErrorType; message: string };
}

export type Verdict = (CheckResult | InconclusiveResult) & { scenario: string };

export interface EvaluationReport {
  total: number;
  passed: number;
  failed: number;
  inconclusive: number;
  verdicts: Verdict[];
}
