// Stepper: advances a circuit model by one rising clock edge
//
// Every guard, next-value function and output drive reads the same
// pre-edge snapshot; the new register values are committed together.

import { CircuitModel } from '../circuit/model.js';
import { CircuitError, CircuitErrorType, TraceError, TraceErrorType } from '../errors.js';
import {
  allX,
  isBitString,
  normalizeBits,
  resize,
  settle,
  unresolved,
  type Truth,
} from '../logic/four-state.js';
import type { Cause, RegisterSignal, SignalReader, UpdateRule } from '../types/circuit.js';
import type { CycleVector } from '../types/trace.js';

// What to do with a declared input missing from a cycle's vector
export type UndrivenPolicy = 'error' | 'zero' | 'unknown';

export interface StepperOptions {
  undriven?: UndrivenPolicy;
}

// One acceptable result of a clock edge
export interface EdgeOutcome {
  registers: CycleVector;
  outputs: CycleVector;
  causes: Record<string, Cause>;
}

// Picks which outcome to commit; index 0 is the priority outcome
export type OutcomeSelector = (outcomes: readonly EdgeOutcome[]) => number;

export interface StepResult {
  cycle: number;
  inputs: CycleVector;
  outcome: EdgeOutcome;
  alternatives: EdgeOutcome[];
  ambiguities: string[];    // Labels of ambiguity guards that held
}

export interface EdgeEvaluation {
  inputs: CycleVector;      // Inputs after the undriven policy
  outcomes: EdgeOutcome[];
  ambiguities: string[];
}

interface Candidate {
  value: string;
  cause: Cause;
}

export class Stepper {
  private model: CircuitModel;
  private undriven: UndrivenPolicy;
  private cycle = 0;

  constructor(model: CircuitModel, options: StepperOptions = {}) {
    this.model = model;
    this.undriven = options.undriven ?? 'error';
  }

  /**
   * Reset the model's registers and the cycle counter
   */
  reset(): void {
    this.model.reset();
    this.cycle = 0;
  }

  getCycle(): number {
    return this.cycle;
  }

  /**
   * Apply one clock edge with the given cycle inputs
   */
  step(inputs: CycleVector, select?: OutcomeSelector): StepResult {
    const { inputs: driven, outcomes, ambiguities } = this.evaluate(inputs);

    const index = select ? select(outcomes) : 0;
    if (!Number.isInteger(index) || index < 0 || index >= outcomes.length) {
      throw new RangeError(`Outcome selector returned ${index}, expected 0..${outcomes.length - 1}`);
    }

    const outcome = outcomes[index];
    const cycle = this.cycle;
    this.advance(outcome.registers);

    return {
      cycle,
      inputs: driven,
      outcome,
      alternatives: outcomes.filter((_, i) => i !== index),
      ambiguities,
    };
  }

  /**
   * Every acceptable outcome of one edge taken from `state` (the model's
   * registers by default), priority outcome first. Nothing is committed.
   */
  evaluate(inputs: CycleVector, state: CycleVector = this.model.state()): EdgeEvaluation {
    const driven = this.driveInputs(inputs);
    const snapshot = { ...state };
    const env = createReader(driven, snapshot);

    const candidates = new Map<string, Candidate[]>();
    const ambiguities: string[] = [];
    const resetLevel = this.resetLevel(driven);

    for (const reg of this.model.listRegisters()) {
      const current = snapshot[reg.name];
      if (current === undefined) {
        throw new CircuitError(CircuitErrorType.INVALID_VALUE, `Register '${reg.name}' has no value`);
      }
      if (resetLevel === 1) {
        candidates.set(reg.name, [{ value: reg.reset, cause: { kind: 'reset', signal: this.resetSignal() } }]);
        continue;
      }

      const primary = this.evaluateRules(reg, this.model.rulesFor(reg.name), 0, current, env);
      if (resetLevel === 'X') {
        candidates.set(reg.name, [{
          value: unresolved(primary.value, reg.reset, this.model.unknowns),
          cause: { kind: 'unknown', detail: `reset '${this.resetSignal()}' is X or Z` },
        }]);
        continue;
      }

      candidates.set(reg.name, this.withAmbiguousOutcomes(reg, primary, current, env, ambiguities));
    }

    const outcomes = this.enumerateOutcomes(candidates).map((registers) =>
      this.buildOutcome(registers, candidates, driven)
    );

    return { inputs: driven, outcomes, ambiguities };
  }

  /**
   * Commit register values and count the edge
   */
  advance(registers: CycleVector): void {
    this.model.commit(registers);
    this.cycle++;
  }

  // First holding guard wins. A guard that is X leaves the register
  // unresolved between its rule and whatever the remaining rules produce.
  private evaluateRules(
    reg: RegisterSignal,
    rules: readonly UpdateRule[],
    from: number,
    current: string,
    env: SignalReader
  ): Candidate {
    for (let i = from; i < rules.length; i++) {
      const rule = rules[i];
      const truth = rule.guard(env);
      if (truth === 0) continue;

      const value = this.applyRule(reg, rule, current, env);
      if (truth === 1) {
        return { value, cause: { kind: 'rule', rule } };
      }

      const rest = this.evaluateRules(reg, rules, i + 1, current, env);
      return {
        value: unresolved(value, rest.value, this.model.unknowns),
        cause: { kind: 'unknown', detail: `guard of rule '${rule.label}' is X` },
      };
    }

    return { value: current, cause: { kind: 'hold' } };
  }

  // Under a holding ambiguity guard every holding rule is acceptable
  private withAmbiguousOutcomes(
    reg: RegisterSignal,
    primary: Candidate,
    current: string,
    env: SignalReader,
    labels: string[]
  ): Candidate[] {
    const result: Candidate[] = [primary];

    for (const ambiguity of this.model.ambiguitiesFor(reg.name)) {
      if (ambiguity.guard(env) !== 1) continue;
      labels.push(ambiguity.label);

      for (const rule of this.model.rulesFor(reg.name)) {
        if (rule.guard(env) !== 1) continue;
        const value = this.applyRule(reg, rule, current, env);
        if (result.some((c) => c.value === value)) continue;
        result.push({ value, cause: { kind: 'rule', rule, ambiguity: ambiguity.label } });
      }
    }

    return result;
  }

  private applyRule(reg: RegisterSignal, rule: UpdateRule, current: string, env: SignalReader): string {
    const value = normalizeBits(rule.next(current, env));
    if (!isBitString(value)) {
      throw new CircuitError(
        CircuitErrorType.INVALID_VALUE,
        `Rule '${rule.label}' of '${reg.name}' produced '${value}'`
      );
    }
    return settle(resize(value, reg.width));
  }

  // Cartesian product of per-register candidates, priority outcome first
  private enumerateOutcomes(candidates: Map<string, Candidate[]>): CycleVector[] {
    let states: CycleVector[] = [{}];
    for (const [name, options] of candidates) {
      const next: CycleVector[] = [];
      for (const state of states) {
        for (const option of options) {
          next.push({ ...state, [name]: option.value });
        }
      }
      states = next;
    }
    return states;
  }

  private buildOutcome(
    registers: CycleVector,
    candidates: Map<string, Candidate[]>,
    inputs: CycleVector
  ): EdgeOutcome {
    const causes: Record<string, Cause> = {};
    for (const [name, options] of candidates) {
      const chosen = options.find((c) => c.value === registers[name]) ?? options[0];
      causes[name] = chosen.cause;
    }

    const env = createReader(inputs, registers);
    const outputs: CycleVector = {};
    for (const sig of this.model.listObserved()) {
      if (sig.kind === 'register') {
        outputs[sig.name] = registers[sig.name];
        continue;
      }
      const decl = this.model.getSignal(sig.name);
      if (decl?.kind !== 'output') continue;
      const value = normalizeBits(decl.drive(env));
      if (!isBitString(value)) {
        throw new CircuitError(
          CircuitErrorType.INVALID_VALUE,
          `Output '${sig.name}' was driven with '${value}'`
        );
      }
      outputs[sig.name] = resize(value, sig.width);
    }

    return { registers, outputs, causes };
  }

  private driveInputs(inputs: CycleVector): CycleVector {
    const declared = this.model.listInputs();
    const names = new Set(declared.map((s) => s.name));

    const extra = Object.keys(inputs).filter((name) => !names.has(name));
    if (extra.length > 0) {
      throw new TraceError(
        TraceErrorType.SIGNAL_SET_MISMATCH,
        `Cycle ${this.cycle}: '${extra.join("', '")}' is not a declared input`
      );
    }

    const driven: CycleVector = {};
    for (const sig of declared) {
      const raw = inputs[sig.name];
      if (raw === undefined) {
        if (this.undriven === 'error') {
          throw new TraceError(
            TraceErrorType.SIGNAL_SET_MISMATCH,
            `Cycle ${this.cycle}: input '${sig.name}' is not driven`
          );
        }
        driven[sig.name] = this.undriven === 'zero' ? '0'.repeat(sig.width) : allX(sig.width);
        continue;
      }

      const value = normalizeBits(raw);
      if (!isBitString(value, sig.width)) {
        throw new TraceError(
          TraceErrorType.INVALID_BIT_STRING,
          `Cycle ${this.cycle}: input '${sig.name}' = '${raw}' is not a ${sig.width}-bit value`
        );
      }
      driven[sig.name] = value;
    }
    return driven;
  }

  private resetSignal(): string {
    return this.model.getReset()?.signal ?? '';
  }

  private resetLevel(inputs: CycleVector): Truth {
    const spec = this.model.getReset();
    if (!spec) return 0;
    const level = inputs[spec.signal];
    if (level === 'X' || level === 'Z') return 'X';
    return level === spec.activeLevel ? 1 : 0;
  }
}

function createReader(inputs: CycleVector, registers: CycleVector): SignalReader {
  return {
    read(name: string): string {
      const value = inputs[name] ?? registers[name];
      if (value === undefined) {
        throw new CircuitError(
          CircuitErrorType.UNKNOWN_SIGNAL,
          `'${name}' is neither an input nor a register`
        );
      }
      return value;
    },
  };
}
