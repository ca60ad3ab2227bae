// Trace runner: drives a whole segmented input sequence through the stepper

import { CircuitModel } from '../circuit/model.js';
import { TraceError, TraceErrorType } from '../errors.js';
import { segmentCycles, validateSegment } from '../trace/segment.js';
import { Stepper, type StepperOptions } from './stepper.js';
import type { Cause, ObservedSignal } from '../types/circuit.js';
import type { CycleVector, Segment } from '../types/trace.js';

// One reachable register state after an edge
export interface Branch {
  sources: number[];        // Branches of the previous cycle it is reached from
  registers: CycleVector;
  outputs: CycleVector;
  causes: Record<string, Cause>;
  ambiguities: string[];    // Ambiguity guards that held on the edge
}

export interface SimulatedCycle {
  segment: number;          // Input segment index
  cycle: number;            // Cycle within the input segment
  absoluteCycle: number;    // Cycle across the whole scenario
  inputs: CycleVector;
  outputs: CycleVector;     // Outputs of branches[0]
  causes: Record<string, Cause>;
  alternatives: CycleVector[];  // Outputs of the other branches
  ambiguities: string[];
  branches: Branch[];
}

export interface SimulatedSegment {
  clockCycles: number;
  cycles: SimulatedCycle[];
}

export interface SimulatedTrace {
  signals: ObservedSignal[];
  segments: SimulatedSegment[];
  totalCycles: number;
}

export interface RunOptions {
  // Expected outputs per absolute cycle. Only branches that agree with
  // them are carried forward, and they are listed first.
  expected?: readonly CycleVector[];
  // Upper bound on the register states carried across one edge
  maxBranches?: number;
}

export const DEFAULT_MAX_BRANCHES = 1024;

/**
 * Runs segmented inputs from reset. Ambiguous edges fork the register
 * state; every distinct reachable state is kept, so a checker can decide
 * afterwards which branch a recorded trace took.
 */
export class TraceRunner {
  private model: CircuitModel;
  private stepper: Stepper;

  constructor(model: CircuitModel, options: StepperOptions = {}) {
    this.model = model;
    this.stepper = new Stepper(model, options);
  }

  /**
   * Reset the model and run every input segment in order
   */
  run(inputSegments: readonly Segment[], options: RunOptions = {}): SimulatedTrace {
    inputSegments.forEach(validateSegment);
    this.stepper.reset();

    const maxBranches = options.maxBranches ?? DEFAULT_MAX_BRANCHES;
    const signals = this.model.listObserved();
    const segments: SimulatedSegment[] = [];
    let frontier: Frontier[] = [{ index: 0, registers: this.model.state() }];
    let absoluteCycle = 0;

    inputSegments.forEach((segment, segmentIndex) => {
      const cycles: SimulatedCycle[] = [];

      segmentCycles(segment).forEach((inputs, cycle) => {
        let driven: CycleVector = {};
        const branches: Branch[] = [];
        const byState = new Map<string, Branch>();

        for (const source of frontier) {
          const edge = this.stepper.evaluate(inputs, source.registers);
          driven = edge.inputs;
          for (const outcome of edge.outcomes) {
            const key = stateKey(outcome.registers);
            const known = byState.get(key);
            if (known) {
              if (!known.sources.includes(source.index)) known.sources.push(source.index);
              continue;
            }
            const branch: Branch = {
              sources: [source.index],
              registers: outcome.registers,
              outputs: outcome.outputs,
              causes: outcome.causes,
              ambiguities: edge.ambiguities,
            };
            byState.set(key, branch);
            branches.push(branch);
          }
        }

        if (branches.length > maxBranches) {
          throw new TraceError(
            TraceErrorType.BRANCH_LIMIT,
            `Cycle ${absoluteCycle}: ambiguous edges reach ${branches.length} register states, more than ${maxBranches}`
          );
        }

        const want = options.expected?.[absoluteCycle];
        const ordered = want ? orderByAgreement(branches, want, signals) : branches;
        const [primary] = ordered;

        cycles.push({
          segment: segmentIndex,
          cycle,
          absoluteCycle,
          inputs: driven,
          outputs: primary.outputs,
          causes: primary.causes,
          alternatives: ordered.slice(1).map((branch) => branch.outputs),
          ambiguities: primary.ambiguities,
          branches: ordered,
        });

        frontier = nextFrontier(ordered, want, signals);
        this.stepper.advance(primary.registers);
        absoluteCycle++;
      });

      segments.push({ clockCycles: segment.clockCycles, cycles });
    });

    return { signals, segments, totalCycles: absoluteCycle };
  }
}

/**
 * Every simulated cycle in scenario order
 */
export function simulatedCycles(trace: SimulatedTrace): SimulatedCycle[] {
  return trace.segments.flatMap((segment) => segment.cycles);
}

/**
 * Whether a branch's observed outputs equal an expected vector
 */
export function agrees(
  outputs: CycleVector,
  expected: CycleVector,
  signals: readonly ObservedSignal[]
): boolean {
  return signals.every((s) => outputs[s.name] === expected[s.name]);
}

interface Frontier {
  index: number;
  registers: CycleVector;
}

function stateKey(registers: CycleVector): string {
  return JSON.stringify(Object.entries(registers));
}

function orderByAgreement(
  branches: Branch[],
  expected: CycleVector,
  signals: readonly ObservedSignal[]
): Branch[] {
  const matching = branches.filter((b) => agrees(b.outputs, expected, signals));
  return [...matching, ...branches.filter((b) => !matching.includes(b))];
}

// With expected outputs only agreeing branches go on; once none agrees the
// trace has already diverged and the priority branch alone is followed.
function nextFrontier(
  branches: Branch[],
  expected: CycleVector | undefined,
  signals: readonly ObservedSignal[]
): Frontier[] {
  const all = branches.map((branch, index) => ({ index, registers: branch.registers }));
  if (!expected) return all;
  const matching = all.filter(({ index }) => agrees(branches[index].outputs, expected, signals));
  return matching.length > 0 ? matching : all.slice(0, 1);
}
