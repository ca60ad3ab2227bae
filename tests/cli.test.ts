import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { main } from '../src/cli.js';

const root = fileURLToPath(new URL('..', import.meta.url));
const SHIFT_COUNT = join(root, 'circuits', 'shift-count.json');
const SHIFT_TRACES = join(root, 'traces', 'shift-count.json');
const JK_TRACE = join(root, 'traces', 'jk-fsm.txt');

describe('CLI', () => {
  const testDir = join(tmpdir(), 'rtl-trace-check-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      expect(main(['node', 'cli.js'])).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with -h flag', () => {
      expect(main(['node', 'cli.js', '-h'])).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown option', () => {
      expect(main(['node', 'cli.js', '--unknown'])).toBe(1);
      expect(consoleErrors.some(l => l.includes("Unknown option '--unknown'"))).toBe(true);
    });

    it('should error on an invalid undriven policy', () => {
      expect(main(['node', 'cli.js', SHIFT_COUNT, SHIFT_TRACES, '--undriven', 'maybe'])).toBe(1);
      expect(consoleErrors).toContain('Error: --undriven takes one of error, zero, unknown');
    });

    it('should require a circuit and a trace', () => {
      expect(main(['node', 'cli.js', SHIFT_COUNT])).toBe(1);
      expect(consoleErrors).toContain('Error: Expected a circuit file and a trace file');
    });
  });

  describe('checking', () => {
    it('should pass the bundled shift_count traces', () => {
      expect(main(['node', 'cli.js', SHIFT_COUNT, SHIFT_TRACES])).toBe(0);
      const lines = consoleLogs.join('\n').split('\n');
      expect(lines).toEqual([
        'Scenario BasicShiftOperation: PASS (4 cycles)',
        'Scenario CounterRollover: PASS (6 cycles)',
        'Scenario CounterMaximumValue: PASS (8 cycles)',
        '3/3 scenarios passed, 0 failed, 0 inconclusive',
      ]);
    });

    it('should check a TBout trace against a builtin circuit as JSON', () => {
      expect(main(['node', 'cli.js', '--builtin', 'jk_fsm', JK_TRACE, '--json'])).toBe(0);
      const output: unknown = JSON.parse(consoleLogs.join('\n'));
      expect(output).toMatchObject({ total: 2, passed: 2, failed: 0, inconclusive: 0 });
    });

    it('should exit 1 and name the first divergence', () => {
      const trace = join(testDir, 'perturbed.json');
      writeFileSync(trace, JSON.stringify({
        scenario: 'Perturbed',
        'input variable': [{ 'clock cycles': 2, shift_ena: ['1', '1'], count_ena: ['0', '0'], data: ['1', '1'] }],
        'output variable': [{ 'clock cycles': 2, q: ['0001', '0111'] }],
      }));
      expect(main(['node', 'cli.js', SHIFT_COUNT, trace])).toBe(1);
      expect(consoleLogs.join('\n')).toContain(
        'Scenario Perturbed: FAIL at segment 0, cycle 1 (cycle 1): q expected 0111, actual 0011'
      );
    });

    it('should print simulated outputs', () => {
      const trace = join(testDir, 'stimulus.json');
      writeFileSync(trace, JSON.stringify([{
        scenario: 'Stimulus',
        'input variable': [
          { shift_ena: '1', count_ena: '0', data: '1' },
          { shift_ena: '0', count_ena: '1', data: '0' },
        ],
      }]));
      expect(main(['node', 'cli.js', SHIFT_COUNT, trace, '--simulate'])).toBe(0);
      const output: unknown = JSON.parse(consoleLogs.join('\n'));
      expect(output).toEqual([{
        scenario: 'Stimulus',
        'input variable': [
          { 'clock cycles': 1, shift_ena: ['1'], count_ena: ['0'], data: ['1'] },
          { 'clock cycles': 1, shift_ena: ['0'], count_ena: ['1'], data: ['0'] },
        ],
        'output variable': [
          { 'clock cycles': 1, q: ['0001'] },
          { 'clock cycles': 1, q: ['0000'] },
        ],
      }]);
    });
  });

  describe('file errors', () => {
    it('should error on a missing trace file', () => {
      const missing = join(testDir, 'nonexistent.json');
      expect(main(['node', 'cli.js', SHIFT_COUNT, missing])).toBe(1);
      expect(consoleErrors).toContain(`Error: File not found: ${missing}`);
    });

    it('should error on an unknown builtin', () => {
      expect(main(['node', 'cli.js', '--builtin', 'alu', JK_TRACE])).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown builtin circuit 'alu'");
    });

    it('should report a circuit file that is not JSON', () => {
      const circuit = join(testDir, 'broken.json');
      writeFileSync(circuit, '{ "name": ');
      expect(main(['node', 'cli.js', circuit, SHIFT_TRACES])).toBe(1);
      expect(consoleErrors).toHaveLength(1);
      expect(consoleErrors[0].startsWith(`Error: ${circuit} is not valid JSON: `)).toBe(true);
    });

    it('should report an invalid circuit description', () => {
      const circuit = join(testDir, 'bad.json');
      writeFileSync(circuit, JSON.stringify({ name: 'bad', signals: [] }));
      expect(main(['node', 'cli.js', circuit, SHIFT_TRACES])).toBe(1);
      expect(consoleErrors.some(l => l.startsWith('Error [INVALID_DESCRIPTION]: Invalid circuit description'))).toBe(true);
    });
  });
});
