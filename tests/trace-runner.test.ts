import { describe, it, expect } from 'vitest';
import { TraceRunner, simulatedCycles, type SimulatedTrace } from '../src/simulator/trace-runner.js';
import { createShiftCountCircuit } from '../src/circuit/reference.js';
import { buildCircuit, type CircuitDescription } from '../src/circuit/description.js';
import { TraceError, TraceErrorType } from '../src/errors.js';
import type { Segment } from '../src/types/trace.js';

// Hidden 2-bit state whose ambiguous loads both show o = 1
const HIDDEN_FORK: CircuitDescription = {
  name: 'hidden_fork',
  signals: [
    { kind: 'input', name: 'a' },
    { kind: 'input', name: 'b' },
    { kind: 'input', name: 'c' },
    { kind: 'register', name: 's', width: 2, visible: false },
    { kind: 'output', name: 'o', drive: 's[0]' },
  ],
  rules: [
    { register: 's', priority: 1, label: 'load one', when: 'a', next: "2'b01" },
    { register: 's', priority: 2, label: 'load three', when: 'b', next: "2'b11" },
  ],
  ambiguities: [{ register: 's', label: 'a and b both high', when: 'a & b' }],
};

const shiftIn = (data: string[]): Segment => ({
  clockCycles: data.length,
  signals: {
    shift_ena: data.map(() => '1'),
    count_ena: data.map(() => '0'),
    data,
  },
});

const countDown = (cycles: number): Segment => ({
  clockCycles: cycles,
  signals: {
    shift_ena: new Array<string>(cycles).fill('0'),
    count_ena: new Array<string>(cycles).fill('1'),
    data: new Array<string>(cycles).fill('0'),
  },
});

function qValues(trace: SimulatedTrace): string[] {
  return simulatedCycles(trace).map(cycle => cycle.outputs.q);
}

describe('TraceRunner', () => {
  it('should run BasicShiftOperation', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const trace = runner.run([shiftIn(['1', '0', '1', '1'])]);
    expect(trace.totalCycles).toBe(4);
    expect(qValues(trace)).toEqual(['0001', '0010', '0101', '1011']);
  });

  it('should keep the input segmentation', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const trace = runner.run([shiftIn(['1', '1', '1', '1']), countDown(4)]);
    expect(trace.segments.map(s => s.clockCycles)).toEqual([4, 4]);
    expect(trace.segments[1].cycles[0]).toMatchObject({ segment: 1, cycle: 0, absoluteCycle: 4 });
    expect(qValues(trace)).toEqual([
      '0001', '0011', '0111', '1111',
      '1110', '1101', '1100', '1011',
    ]);
  });

  it('should reset the model at the start of every run', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    runner.run([countDown(3)]);
    const trace = runner.run([countDown(2)]);
    expect(qValues(trace)).toEqual(['1111', '1110']);
  });

  it('should be deterministic', () => {
    const segments = [shiftIn(['1', '0', '0', '1']), countDown(3)];
    const runner = new TraceRunner(createShiftCountCircuit());
    const first = runner.run(segments);
    const second = runner.run(segments);
    expect(second).toEqual(first);
    expect(qValues(first)).toEqual(['0001', '0010', '0100', '1001', '1000', '0111', '0110']);
  });

  it('should follow the expected branch on an ambiguous edge', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const both: Segment = {
      clockCycles: 2,
      signals: { shift_ena: ['1', '0'], count_ena: ['1', '1'], data: ['1', '0'] },
    };

    const byPriority = runner.run([both]);
    expect(qValues(byPriority)).toEqual(['0001', '0000']);

    const following = runner.run([both], { expected: [{ q: '1111' }, { q: '1110' }] });
    expect(qValues(following)).toEqual(['1111', '1110']);
    const first = simulatedCycles(following)[0];
    expect(first.alternatives).toEqual([{ q: '0001' }]);
    expect(first.ambiguities).toEqual(['shift_ena and count_ena both high']);
  });

  it('should keep every branch of an ambiguous edge when no trace is given', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const trace = runner.run([{
      clockCycles: 2,
      signals: { shift_ena: ['1', '0'], count_ena: ['1', '1'], data: ['1', '0'] },
    }]);
    const [first, second] = simulatedCycles(trace);
    expect(first.branches.map(b => [b.registers.q, b.sources])).toEqual([['0001', [0]], ['1111', [0]]]);
    expect(second.branches.map(b => [b.registers.q, b.sources])).toEqual([['0000', [0]], ['1110', [1]]]);
    expect(second.alternatives).toEqual([{ q: '1110' }]);
  });

  it('should merge branches that reach the same register state', () => {
    const runner = new TraceRunner(buildCircuit(HIDDEN_FORK));
    const trace = runner.run([{
      clockCycles: 2,
      signals: { a: ['1', '1'], b: ['1', '0'], c: ['0', '0'] },
    }]);
    const [first, second] = simulatedCycles(trace);
    expect(first.branches.map(b => b.registers.s)).toEqual(['01', '11']);
    expect(second.branches).toHaveLength(1);
    expect(second.branches[0]).toMatchObject({ registers: { s: '01' }, outputs: { o: '1' }, sources: [0, 1] });
  });

  it('should stop when ambiguous edges fork too many states', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const both: Segment = {
      clockCycles: 1,
      signals: { shift_ena: ['1'], count_ena: ['1'], data: ['1'] },
    };
    expect(() => runner.run([both], { maxBranches: 1 }))
      .toThrow('Cycle 0: ambiguous edges reach 2 register states, more than 1');
  });

  it('should reject a segment whose arrays disagree with its cycle count', () => {
    const runner = new TraceRunner(createShiftCountCircuit());
    const bad: Segment = {
      clockCycles: 3,
      signals: { shift_ena: ['1', '1', '1'], count_ena: ['0', '0'], data: ['0', '0', '0'] },
    };
    try {
      runner.run([shiftIn(['1']), bad]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TraceError);
      if (e instanceof TraceError) {
        expect(e.type).toBe(TraceErrorType.SEGMENT_LENGTH_MISMATCH);
        expect(e.message).toBe("Segment 1: declares 3 clock cycles but 'count_ena' has 2 values");
      }
    }
  });
});
