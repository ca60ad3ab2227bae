// Circuit model types: signals, guarded update rules and edge causes

import type { Truth } from '../logic/four-state.js';

export type SignalKind = 'input' | 'output' | 'register';

// Read access to the values visible while evaluating a rule or an output
export interface SignalReader {
  read(name: string): string;
}

export type Guard = (env: SignalReader) => Truth;
export type NextValue = (current: string, env: SignalReader) => string;
export type Drive = (env: SignalReader) => string;

export interface InputSignal {
  kind: 'input';
  name: string;
  width: number;
}

export interface RegisterSignal {
  kind: 'register';
  name: string;
  width: number;
  reset: string;        // Bit string of exactly `width` characters
  visible?: boolean;    // Part of the observed output vector (default true)
}

// Combinational output computed from post-edge registers and current inputs
export interface OutputSignal {
  kind: 'output';
  name: string;
  width: number;
  drive: Drive;
  source?: string;      // Expression text the drive was compiled from
}

export type SignalDecl = InputSignal | RegisterSignal | OutputSignal;

export interface ObservedSignal {
  name: string;
  width: number;
  kind: 'output' | 'register';
}

export interface RuleSpec {
  priority: number;
  label?: string;
  guard: Guard;
  next: NextValue;
  guardSource?: string;
  nextSource?: string;
}

export interface UpdateRule extends RuleSpec {
  register: string;
  label: string;
  order: number;        // Insertion order, breaks priority ties
}

// Guard under which every holding rule of a register is an acceptable outcome
export interface AmbiguitySpec {
  label: string;
  guard: Guard;
  guardSource?: string;
}

export interface Ambiguity extends AmbiguitySpec {
  register: string;
}

export interface ResetSpec {
  signal: string;
  activeLevel: '0' | '1';
}

// Why a register holds its post-edge value
export type Cause =
  | { kind: 'reset'; signal: string }
  | { kind: 'rule'; rule: UpdateRule; ambiguity?: string }
  | { kind: 'hold' }
  | { kind: 'unknown'; detail: string };
