import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { loadScenarios, parseScenarios, toScenarioDocument } from '../src/trace/scenario-loader.js';
import { ScenarioOrchestrator } from '../src/checker/orchestrator.js';
import { createShiftCountCircuit } from '../src/circuit/reference.js';
import { TraceError, TraceErrorType } from '../src/errors.js';

function traceErrorOf(fn: () => void): TraceError | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof TraceError) return e;
    throw e;
  }
  return undefined;
}

describe('Scenario loader', () => {
  it('should load the clock-cycles form', () => {
    const [scenario] = parseScenarios({
      scenario: 'BasicShiftOperation',
      'input variable': [{ 'clock cycles': 2, shift_ena: ['1', '1'], count_ena: ['0', '0'], data: ['1', '0'] }],
      'output variable': [{ 'clock cycles': 2, q: ['0001', '0010'] }],
    });
    expect(scenario).toEqual({
      name: 'BasicShiftOperation',
      inputs: [{ clockCycles: 2, signals: { shift_ena: ['1', '1'], count_ena: ['0', '0'], data: ['1', '0'] } }],
      outputs: [{ clockCycles: 2, signals: { q: ['0001', '0010'] } }],
    });
  });

  it('should load per-cycle vectors as one-cycle segments', () => {
    const [scenario] = parseScenarios([{
      scenario: 'OFF to ON',
      'input variable': [{ j: '0', k: '0', areset: '1' }, { j: '1', k: '0', areset: '0' }],
    }]);
    expect(scenario.inputs).toEqual([
      { clockCycles: 1, signals: { j: ['0'], k: ['0'], areset: ['1'] } },
      { clockCycles: 1, signals: { j: ['1'], k: ['0'], areset: ['0'] } },
    ]);
    expect(scenario.outputs).toBeUndefined();
  });

  it('should leave segment length checks to evaluation', () => {
    const scenarios = parseScenarios([
      {
        scenario: 'Short',
        'input variable': [{ 'clock cycles': 2, shift_ena: ['1'], count_ena: ['0', '0'], data: ['0', '0'] }],
        'output variable': [{ 'clock cycles': 2, q: ['0000', '0000'] }],
      },
      {
        scenario: 'Fine',
        'input variable': [{ 'clock cycles': 1, shift_ena: ['0'], count_ena: ['0'], data: ['0'] }],
        'output variable': [{ 'clock cycles': 1, q: ['0000'] }],
      },
    ]);
    const report = new ScenarioOrchestrator(createShiftCountCircuit()).evaluate(scenarios);
    expect(report.verdicts.map(v => v.status)).toEqual(['inconclusive', 'match']);
  });

  it('should report shape errors with their path', () => {
    const error = traceErrorOf(() =>
      parseScenarios({ scenario: 'Bad', 'input variable': [{ 'clock cycles': 1.5, a: ['1'] }] })
    );
    expect(error?.type).toBe(TraceErrorType.INVALID_TRACE);
    expect(error?.message).toContain("input variable.0.clock cycles: must be a non-negative integer");
  });

  it('should reject arrays in per-cycle vectors', () => {
    const error = traceErrorOf(() =>
      parseScenarios({ scenario: 'Bad', 'input variable': [{ a: ['1'] }] })
    );
    expect(error?.message).toContain('input variable.0.a: per-cycle vectors take one bit string per signal');
  });

  it('should reject text that is not JSON', () => {
    const error = traceErrorOf(() => loadScenarios('{ scenario'));
    expect(error?.type).toBe(TraceErrorType.INVALID_TRACE);
    expect(error?.message).toMatch(/^Scenario document is not valid JSON/);
  });

  it('should load and pass the bundled shift_count traces', () => {
    const path = fileURLToPath(new URL('../traces/shift-count.json', import.meta.url));
    const scenarios = loadScenarios(readFileSync(path, 'utf-8'));
    expect(scenarios.map(s => s.name)).toEqual([
      'BasicShiftOperation',
      'CounterRollover',
      'CounterMaximumValue',
    ]);
    const report = new ScenarioOrchestrator(createShiftCountCircuit()).evaluate(scenarios);
    expect(report).toMatchObject({ total: 3, passed: 3, failed: 0, inconclusive: 0 });
  });

  it('should write scenarios back in the clock-cycles form', () => {
    expect(toScenarioDocument({
      name: 'S',
      inputs: [{ clockCycles: 1, signals: { a: ['1'] } }],
    })).toEqual({
      scenario: 'S',
      'input variable': [{ 'clock cycles': 1, a: ['1'] }],
    });
  });
});
