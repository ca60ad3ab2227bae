// Consistency checker: compares a simulated trace with recorded outputs
//
// Cycles are walked by absolute index, signals in declaration order, so
// the first divergence reported is stable across runs.

import { TraceError, TraceErrorType } from '../errors.js';
import { isBitString, normalizeBits } from '../logic/four-state.js';
import { cycleLocations, flattenSegments, type CycleLocation } from '../trace/segment.js';
import { agrees, simulatedCycles, type SimulatedTrace } from '../simulator/trace-runner.js';
import { explainMismatch } from './explain.js';
import type { ObservedSignal } from '../types/circuit.js';
import type { CycleVector, Segment } from '../types/trace.js';
import type { CheckResult, Mismatch } from '../types/verdict.js';

// Expected outputs validated against the observed signals and flattened
export interface ExpectedTrace {
  cycles: CycleVector[];
  locations: CycleLocation[];
}

export class ConsistencyChecker {
  /**
   * Validate expected output segments: signal sets first, then segment
   * lengths, then every value. Values are normalized to upper case.
   */
  prepare(expected: readonly Segment[], signals: readonly ObservedSignal[]): ExpectedTrace {
    const widths = new Map(signals.map((s) => [s.name, s.width]));

    expected.forEach((segment, index) => {
      const names = Object.keys(segment.signals);
      const missing = signals.map((s) => s.name).filter((name) => !names.includes(name));
      const extra = names.filter((name) => !widths.has(name));
      if (missing.length > 0 || extra.length > 0) {
        const details: string[] = [];
        if (missing.length > 0) details.push(`missing '${missing.join("', '")}'`);
        if (extra.length > 0) details.push(`unexpected '${extra.join("', '")}'`);
        throw new TraceError(
          TraceErrorType.SIGNAL_SET_MISMATCH,
          `Output segment ${index}: ${details.join(', ')}`
        );
      }
    });

    const locations = cycleLocations(expected);
    const cycles = flattenSegments(expected).map((raw, index) => {
      const vector: CycleVector = {};
      for (const sig of signals) {
        const value = normalizeBits(raw[sig.name]);
        if (!isBitString(value, sig.width)) {
          const { segment, cycle } = locations[index];
          throw new TraceError(
            TraceErrorType.INVALID_BIT_STRING,
            `Output segment ${segment}, cycle ${cycle}: '${sig.name}' = '${raw[sig.name]}' is not a ${sig.width}-bit value`
          );
        }
        vector[sig.name] = value;
      }
      return vector;
    });

    return { cycles, locations };
  }

  /**
   * Compare a simulated trace with prepared expected outputs.
   *
   * The set of branches consistent with the trace so far is narrowed cycle
   * by cycle; the first cycle that leaves it empty is the divergence.
   */
  compare(simulated: SimulatedTrace, expected: ExpectedTrace): CheckResult {
    if (simulated.totalCycles !== expected.cycles.length) {
      throw new TraceError(
        TraceErrorType.CYCLE_COUNT_MISMATCH,
        `Inputs cover ${simulated.totalCycles} clock cycles but outputs cover ${expected.cycles.length}`
      );
    }

    const ambiguousCycles: number[] = [];
    // The reset state is the single source of the first edge
    let consistent = new Set<number>([0]);

    for (const sim of simulatedCycles(simulated)) {
      const want = expected.cycles[sim.absoluteCycle];
      const reachable = sim.branches
        .map((branch, index) => ({ branch, index }))
        .filter(({ branch }) => branch.sources.some((source) => consistent.has(source)));
      const agreeing = reachable.filter(({ branch }) => agrees(branch.outputs, want, simulated.signals));

      if (agreeing.length > 0) {
        if (agreeing.some(({ branch }) => branch.ambiguities.length > 0)) {
          ambiguousCycles.push(sim.absoluteCycle);
        }
        consistent = new Set(agreeing.map(({ index }) => index));
        continue;
      }

      const candidates = reachable.map(({ branch }) => branch);
      const [reported] = candidates;
      const signal = simulated.signals.find((s) => reported.outputs[s.name] !== want[s.name]);
      if (!signal) continue;

      const location = expected.locations[sim.absoluteCycle];
      const actual = reported.outputs[signal.name];
      const firstMismatch: Mismatch = {
        segment: location.segment,
        cycle: location.cycle,
        absoluteCycle: sim.absoluteCycle,
        signal: signal.name,
        expected: want[signal.name],
        actual,
        reason: explainMismatch(signal, reported, want[signal.name], actual, candidates),
      };

      return {
        status: 'mismatch',
        matches: false,
        cycles: simulated.totalCycles,
        ambiguousCycles,
        firstMismatch,
      };
    }

    return {
      status: 'match',
      matches: true,
      cycles: simulated.totalCycles,
      ambiguousCycles,
    };
  }

  check(simulated: SimulatedTrace, expected: readonly Segment[]): CheckResult {
    return this.compare(simulated, this.prepare(expected, simulated.signals));
  }
}
