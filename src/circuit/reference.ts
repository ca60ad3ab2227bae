// Reference circuits used by the tests, the examples and the CLI's --builtin flag

import { bitwiseAnd, slice, subtract, truthOf } from '../logic/four-state.js';
import { buildCircuit, type CircuitDescription } from './description.js';
import { CircuitModel } from './model.js';
import type { Guard } from '../types/circuit.js';

/**
 * 4-bit shift register with a down counter.
 *
 * q shifts `data` in at the LSB while shift_ena is high, otherwise
 * decrements (mod 16) while count_ena is high, otherwise holds. With both
 * enables high either update is an acceptable outcome.
 */
export function createShiftCountCircuit(): CircuitModel {
  const model = new CircuitModel('shift_count');
  const high = (name: string): Guard => (env) => truthOf(env.read(name), model.unknowns);

  model.declare({ kind: 'input', name: 'shift_ena', width: 1 });
  model.declare({ kind: 'input', name: 'count_ena', width: 1 });
  model.declare({ kind: 'input', name: 'data', width: 1 });
  model.declare({ kind: 'register', name: 'q', width: 4, reset: '0000' });

  model.addRule('q', {
    priority: 1,
    label: 'shift',
    guard: high('shift_ena'),
    next: (q, env) => slice(q, 2, 0) + env.read('data'),
    guardSource: 'shift_ena',
    nextSource: '{q[2:0], data}',
  });
  model.addRule('q', {
    priority: 2,
    label: 'count',
    guard: high('count_ena'),
    next: (q) => subtract(q, '1'),
    guardSource: 'count_ena',
    nextSource: 'q - 1',
  });

  model.declareAmbiguity('q', {
    label: 'shift_ena and count_ena both high',
    guard: (env) =>
      truthOf(bitwiseAnd(env.read('shift_ena'), env.read('count_ena'), model.unknowns), model.unknowns),
    guardSource: 'shift_ena & count_ena',
  });

  return model;
}

// Moore machine: OFF -> ON on j, ON -> OFF on k. areset is sampled at the
// clock edge and forces OFF. `out` is 1 in ON.
export const JK_FSM: CircuitDescription = {
  name: 'jk_fsm',
  signals: [
    { kind: 'input', name: 'j' },
    { kind: 'input', name: 'k' },
    { kind: 'input', name: 'areset' },
    { kind: 'register', name: 'state', reset: '0', visible: false },
    { kind: 'output', name: 'out', drive: 'state' },
  ],
  reset: { signal: 'areset', activeLevel: '1' },
  rules: [
    { register: 'state', priority: 1, label: 'turn on', when: '!state && j', next: "1'b1" },
    { register: 'state', priority: 2, label: 'turn off', when: 'state && k', next: "1'b0" },
  ],
};

export const XOR_AND: CircuitDescription = {
  name: 'xor_and',
  signals: [
    { kind: 'input', name: 'x' },
    { kind: 'input', name: 'y' },
    { kind: 'output', name: 'z', drive: '(x ^ y) & x' },
  ],
};

export function createJkFsmCircuit(): CircuitModel {
  return buildCircuit(JK_FSM);
}

export function createXorAndCircuit(): CircuitModel {
  return buildCircuit(XOR_AND);
}

export const REFERENCE_CIRCUITS: Record<string, () => CircuitModel> = {
  shift_count: createShiftCountCircuit,
  jk_fsm: createJkFsmCircuit,
  xor_and: createXorAndCircuit,
};
