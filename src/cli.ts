/**
 * Trace consistency CLI
 *
 * Usage: rtl-trace-check <circuit.json> <trace> [--json] [--simulate]
 *                        [--undriven error|zero|unknown] [--radix binary|decimal]
 *        rtl-trace-check --builtin <name> <trace> [...]
 */

import { readFileSync } from 'fs';
import { buildCircuit } from './circuit/description.js';
import { CircuitModel } from './circuit/model.js';
import { REFERENCE_CIRCUITS } from './circuit/reference.js';
import { ScenarioOrchestrator } from './checker/orchestrator.js';
import { CircuitError, TraceError } from './errors.js';
import { formatReport, toRecords, withSimulatedOutputs } from './report/format.js';
import { loadScenarios } from './trace/scenario-loader.js';
import { parseTbout, type TboutRadix } from './trace/tbout.js';
import type { UndrivenPolicy } from './simulator/stepper.js';
import type { Scenario } from './types/trace.js';

interface CliOptions {
  circuitFile: string;
  builtin: string;
  traceFile: string;
  json: boolean;
  simulate: boolean;
  undriven: UndrivenPolicy;
  radix: TboutRadix;
}

const UNDRIVEN_POLICIES: readonly UndrivenPolicy[] = ['error', 'zero', 'unknown'];
const RADIXES: readonly TboutRadix[] = ['binary', 'decimal'];

function isUndrivenPolicy(value: string): value is UndrivenPolicy {
  return UNDRIVEN_POLICIES.some((policy) => policy === value);
}

function isRadix(value: string): value is TboutRadix {
  return RADIXES.some((radix) => radix === value);
}

function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  const positional: string[] = [];
  let builtin = '';
  let json = false;
  let simulate = false;
  let undriven: UndrivenPolicy = 'error';
  let radix: TboutRadix = 'binary';

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '--json') {
      json = true;
    } else if (arg === '--simulate') {
      simulate = true;
    } else if (arg === '--builtin') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: --builtin requires a circuit name');
        return null;
      }
      builtin = cliArgs[++i];
    } else if (arg === '--undriven') {
      const value = cliArgs[++i] ?? '';
      if (!isUndrivenPolicy(value)) {
        console.error(`Error: --undriven takes one of ${UNDRIVEN_POLICIES.join(', ')}`);
        return null;
      }
      undriven = value;
    } else if (arg === '--radix') {
      const value = cliArgs[++i] ?? '';
      if (!isRadix(value)) {
        console.error(`Error: --radix takes one of ${RADIXES.join(', ')}`);
        return null;
      }
      radix = value;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  const expected = builtin ? 1 : 2;
  if (positional.length !== expected) {
    console.error(
      builtin
        ? 'Error: Expected a trace file after --builtin <name>'
        : 'Error: Expected a circuit file and a trace file'
    );
    return null;
  }

  return {
    circuitFile: builtin ? '' : positional[0],
    builtin,
    traceFile: positional[positional.length - 1],
    json,
    simulate,
    undriven,
    radix,
  };
}

function printUsage(): void {
  console.log(`Trace consistency checker

Usage: rtl-trace-check <circuit.json> <trace> [options]
       rtl-trace-check --builtin <name> <trace> [options]

The trace is a scenario JSON document (.json) or a TBout text file.

Options:
  --builtin <name>     Use a reference circuit (${Object.keys(REFERENCE_CIRCUITS).join(', ')})
  --json               Print verdicts as JSON
  --simulate           Print simulated outputs instead of checking
  --undriven <policy>  Missing inputs: error (default), zero or unknown
  --radix <radix>      TBout values: binary (default) or decimal
  -h, --help           Show this help message

Examples:
  rtl-trace-check circuits/shift-count.json traces/shift-count.json
  rtl-trace-check --builtin jk_fsm traces/jk-fsm.txt --json`);
}

function readText(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code === 'ENOENT') {
      console.error(`Error: File not found: ${path}`);
    } else {
      console.error(`Error: Cannot read file: ${path}`);
    }
    return null;
  }
}

function loadCircuit(options: CliOptions): CircuitModel | null {
  if (options.builtin) {
    if (!Object.hasOwn(REFERENCE_CIRCUITS, options.builtin)) {
      console.error(`Error: Unknown builtin circuit '${options.builtin}'`);
      return null;
    }
    return REFERENCE_CIRCUITS[options.builtin]();
  }

  const text = readText(options.circuitFile);
  if (text === null) return null;

  let description: unknown;
  try {
    description = JSON.parse(text);
  } catch (e) {
    console.error(`Error: ${options.circuitFile} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
  return buildCircuit(description);
}

function loadTrace(options: CliOptions, model: CircuitModel): Scenario[] | null {
  const text = readText(options.traceFile);
  if (text === null) return null;

  if (options.traceFile.toLowerCase().endsWith('.json')) {
    return loadScenarios(text);
  }
  return parseTbout(text, model, { radix: options.radix });
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  try {
    const model = loadCircuit(options);
    if (!model) return 1;

    const scenarios = loadTrace(options, model);
    if (!scenarios) return 1;

    const orchestrator = new ScenarioOrchestrator(model, { undriven: options.undriven });

    if (options.simulate) {
      const documents = scenarios.map((scenario) =>
        withSimulatedOutputs(scenario, orchestrator.simulate(scenario))
      );
      console.log(JSON.stringify(documents, null, 2));
      return 0;
    }

    const report = orchestrator.evaluate(scenarios);

    if (options.json) {
      const { total, passed, failed, inconclusive } = report;
      console.log(JSON.stringify({ total, passed, failed, inconclusive, verdicts: toRecords(report) }, null, 2));
    } else {
      console.log(formatReport(report));
    }

    return report.passed === report.total ? 0 : 1;
  } catch (e) {
    if (e instanceof CircuitError || e instanceof TraceError) {
      console.error(`Error [${e.type}]: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
