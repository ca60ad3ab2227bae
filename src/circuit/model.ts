// Circuit model: declared signals, register state and prioritized update rules

import { CircuitError, CircuitErrorType } from '../errors.js';
import { isBitString, normalizeBits, settle, type UnknownMode } from '../logic/four-state.js';
import type {
  Ambiguity,
  AmbiguitySpec,
  InputSignal,
  ObservedSignal,
  OutputSignal,
  RegisterSignal,
  ResetSpec,
  RuleSpec,
  SignalDecl,
  UpdateRule,
} from '../types/circuit.js';

export interface CircuitOptions {
  // How X and Z inputs propagate through guards and drives
  unknowns?: UnknownMode;
}

export class CircuitModel {
  readonly name: string;
  readonly unknowns: UnknownMode;

  private signals: SignalDecl[] = [];
  private signalMap: Map<string, SignalDecl> = new Map();
  private rules: Map<string, UpdateRule[]> = new Map();
  private ambiguities: Map<string, Ambiguity[]> = new Map();
  private resetSpec: ResetSpec | null = null;
  private values: Map<string, string> = new Map();
  private ruleCount = 0;

  constructor(name: string = 'circuit', options: CircuitOptions = {}) {
    this.name = name;
    this.unknowns = options.unknowns ?? 'structural';
  }

  /**
   * Declare a signal. Registers start at their reset value.
   */
  declare(signal: SignalDecl): void {
    if (this.signalMap.has(signal.name)) {
      throw new CircuitError(
        CircuitErrorType.DUPLICATE_SIGNAL,
        `Signal '${signal.name}' is already declared`
      );
    }
    if (!Number.isInteger(signal.width) || signal.width < 1) {
      throw new CircuitError(
        CircuitErrorType.INVALID_WIDTH,
        `Signal '${signal.name}' has invalid width ${signal.width}`
      );
    }

    let decl: SignalDecl = signal;
    if (signal.kind === 'register') {
      const reset = normalizeBits(signal.reset);
      if (!isBitString(reset, signal.width)) {
        throw new CircuitError(
          CircuitErrorType.INVALID_RESET_VALUE,
          `Register '${signal.name}' reset value '${signal.reset}' is not a ${signal.width}-bit value`
        );
      }
      const initial = settle(reset);
      decl = { ...signal, reset: initial };
      this.values.set(signal.name, initial);
      this.rules.set(signal.name, []);
      this.ambiguities.set(signal.name, []);
    }

    this.signals.push(decl);
    this.signalMap.set(decl.name, decl);
  }

  /**
   * Append an update rule for a register. Rules are kept sorted by
   * priority (lower first), ties broken by insertion order.
   */
  addRule(register: string, spec: RuleSpec): UpdateRule {
    const rules = this.requireRegisterEntry(this.rules, register);
    const rule: UpdateRule = {
      ...spec,
      register,
      label: spec.label ?? `rule${this.ruleCount}`,
      order: this.ruleCount++,
    };
    rules.push(rule);
    rules.sort((a, b) => a.priority - b.priority || a.order - b.order);
    return rule;
  }

  declareAmbiguity(register: string, spec: AmbiguitySpec): Ambiguity {
    const list = this.requireRegisterEntry(this.ambiguities, register);
    const ambiguity: Ambiguity = { ...spec, register };
    list.push(ambiguity);
    return ambiguity;
  }

  /**
   * Route a 1-bit input as the reset. An asserted reset wins over every rule.
   */
  setReset(spec: ResetSpec): void {
    const signal = this.signalMap.get(spec.signal);
    if (!signal || signal.kind !== 'input' || signal.width !== 1) {
      throw new CircuitError(
        CircuitErrorType.UNKNOWN_SIGNAL,
        `Reset '${spec.signal}' must be a declared 1-bit input`
      );
    }
    this.resetSpec = { ...spec };
  }

  getReset(): ResetSpec | null {
    return this.resetSpec;
  }

  /**
   * Put every register back to its reset value
   */
  reset(): void {
    for (const reg of this.listRegisters()) {
      this.values.set(reg.name, reg.reset);
    }
  }

  getSignal(name: string): SignalDecl | undefined {
    return this.signalMap.get(name);
  }

  listSignals(): readonly SignalDecl[] {
    return this.signals;
  }

  listInputs(): InputSignal[] {
    return this.signals.filter((s): s is InputSignal => s.kind === 'input');
  }

  listRegisters(): RegisterSignal[] {
    return this.signals.filter((s): s is RegisterSignal => s.kind === 'register');
  }

  listOutputs(): OutputSignal[] {
    return this.signals.filter((s): s is OutputSignal => s.kind === 'output');
  }

  /**
   * Signals that make up a cycle's output vector, in declaration order
   */
  listObserved(): ObservedSignal[] {
    const observed: ObservedSignal[] = [];
    for (const sig of this.signals) {
      if (sig.kind === 'output' || (sig.kind === 'register' && sig.visible !== false)) {
        observed.push({ name: sig.name, width: sig.width, kind: sig.kind });
      }
    }
    return observed;
  }

  rulesFor(register: string): readonly UpdateRule[] {
    return this.requireRegisterEntry(this.rules, register);
  }

  ambiguitiesFor(register: string): readonly Ambiguity[] {
    return this.requireRegisterEntry(this.ambiguities, register);
  }

  /**
   * Copy of the current register values
   */
  state(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /**
   * Replace all register values at once. Only the stepper calls this,
   * after computing every next value from one pre-edge snapshot.
   */
  commit(next: Record<string, string>): void {
    for (const reg of this.listRegisters()) {
      const value = next[reg.name];
      if (value === undefined || !isBitString(value, reg.width)) {
        throw new CircuitError(
          CircuitErrorType.INVALID_VALUE,
          `Register '${reg.name}' cannot take value '${value ?? ''}'`
        );
      }
    }
    for (const reg of this.listRegisters()) {
      this.values.set(reg.name, next[reg.name]);
    }
  }

  private requireRegisterEntry<T>(map: Map<string, T[]>, register: string): T[] {
    const entry = map.get(register);
    if (!entry) {
      throw new CircuitError(
        CircuitErrorType.UNKNOWN_REGISTER,
        `'${register}' is not a declared register`
      );
    }
    return entry;
  }
}
