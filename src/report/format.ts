// Report formatting: plain records for JSON output and text lines for the terminal

import type { SimulatedTrace } from '../simulator/trace-runner.js';
import { toSegment } from '../trace/segment.js';
import { toScenarioDocument } from '../trace/scenario-loader.js';
import type { Scenario } from '../types/trace.js';
import type { EvaluationReport, Mismatch, Verdict } from '../types/verdict.js';

export interface VerdictRecord {
  scenario: string;
  matches: boolean;
  status: Verdict['status'];
  cycles?: number;
  ambiguousCycles?: number[];
  firstMismatch?: Mismatch;
  error?: { type: string; message: string };
}

export function toRecord(verdict: Verdict): VerdictRecord {
  switch (verdict.status) {
    case 'match':
      return {
        scenario: verdict.scenario,
        matches: true,
        status: verdict.status,
        cycles: verdict.cycles,
        ambiguousCycles: verdict.ambiguousCycles,
      };
    case 'mismatch':
      return {
        scenario: verdict.scenario,
        matches: false,
        status: verdict.status,
        cycles: verdict.cycles,
        ambiguousCycles: verdict.ambiguousCycles,
        firstMismatch: verdict.firstMismatch,
      };
    case 'inconclusive':
      return {
        scenario: verdict.scenario,
        matches: false,
        status: verdict.status,
        error: verdict.error,
      };
  }
}

export function toRecords(report: EvaluationReport): VerdictRecord[] {
  return report.verdicts.map(toRecord);
}

export function formatVerdict(verdict: Verdict): string {
  const head = `Scenario ${verdict.scenario}:`;
  switch (verdict.status) {
    case 'match': {
      const ambiguous = verdict.ambiguousCycles.length > 0
        ? `, ambiguous cycles accepted: ${verdict.ambiguousCycles.join(', ')}`
        : '';
      return `${head} PASS (${verdict.cycles} cycles${ambiguous})`;
    }
    case 'mismatch': {
      const m = verdict.firstMismatch;
      return (
        `${head} FAIL at segment ${m.segment}, cycle ${m.cycle} (cycle ${m.absoluteCycle}): ` +
        `${m.signal} expected ${m.expected}, actual ${m.actual} - ${m.reason}`
      );
    }
    case 'inconclusive':
      return `${head} INCONCLUSIVE [${verdict.error.type}] ${verdict.error.message}`;
  }
}

export function formatSummary(report: EvaluationReport): string {
  return `${report.passed}/${report.total} scenarios passed, ${report.failed} failed, ${report.inconclusive} inconclusive`;
}

export function formatReport(report: EvaluationReport): string {
  return [...report.verdicts.map(formatVerdict), formatSummary(report)].join('\n');
}

/**
 * Scenario with its simulated outputs filled in as "output variable",
 * one output segment per input segment
 */
export function withSimulatedOutputs(scenario: Scenario, trace: SimulatedTrace): Record<string, unknown> {
  const names = trace.signals.map((s) => s.name);
  const outputs = trace.segments.map((segment) =>
    toSegment(segment.cycles.map((cycle) => cycle.outputs), names)
  );
  return toScenarioDocument({ ...scenario, outputs });
}

