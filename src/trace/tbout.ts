// TBout text traces, one line per sampled cycle as a testbench prints them:
//
//   scenario: 1, clk = 1, j = 1, k = 0, areset = 0, out = 1
//   [check]scenario: 1, clk = 1, j = 0, k = 1, areset = 0, out = 0
//
// Each line is sampled after one rising edge. Consecutive lines with the
// same scenario name form one scenario; every line becomes a one-cycle
// segment.

import { CircuitModel } from '../circuit/model.js';
import { TraceError, TraceErrorType } from '../errors.js';
import { allX, fromBigInt, normalizeBits } from '../logic/four-state.js';
import type { Scenario } from '../types/trace.js';

export type TboutRadix = 'binary' | 'decimal';

export interface TboutOptions {
  // How values are written; decimal values are converted to the signal's width
  radix?: TboutRadix;
  // Names printed by the testbench that are not circuit signals
  ignore?: readonly string[];
}

const CHECK_TAG = '[check]';
const DECIMAL = /^\d+$/;

export function parseTbout(text: string, model: CircuitModel, options: TboutOptions = {}): Scenario[] {
  const radix = options.radix ?? 'binary';
  const ignore = new Set(options.ignore ?? ['clk']);
  const observed = new Set(model.listObserved().map((s) => s.name));

  const scenarios: Scenario[] = [];
  let current: Scenario | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;
    const lineNo = i + 1;

    const body = line.startsWith(CHECK_TAG) ? line.slice(CHECK_TAG.length).trim() : line;
    const [head, ...items] = body.split(',').map((part) => part.trim());
    const match = /^scenario\s*:\s*(.+)$/.exec(head);
    if (!match) {
      throw new TraceError(TraceErrorType.INVALID_TRACE, `Line ${lineNo}: expected 'scenario: <name>' first`);
    }
    const name = match[1].trim();

    const inputs: Record<string, string[]> = {};
    const outputs: Record<string, string[]> = {};
    for (const item of items) {
      const eq = item.indexOf('=');
      if (eq < 0) {
        throw new TraceError(TraceErrorType.INVALID_TRACE, `Line ${lineNo}: '${item}' is not 'name = value'`);
      }
      const signal = item.slice(0, eq).trim();
      const raw = item.slice(eq + 1).trim();
      if (ignore.has(signal)) continue;

      const value = convert(raw, signal, radix, model);
      if (observed.has(signal)) {
        outputs[signal] = [value];
      } else {
        // Unknown names stay with the inputs and are reported by the stepper
        inputs[signal] = [value];
      }
    }

    if (!current || current.name !== name) {
      current = { name, inputs: [], outputs: [] };
      scenarios.push(current);
    }
    current.inputs.push({ clockCycles: 1, signals: inputs });
    current.outputs?.push({ clockCycles: 1, signals: outputs });
  }

  return scenarios;
}

function convert(raw: string, signal: string, radix: TboutRadix, model: CircuitModel): string {
  if (radix === 'binary') return normalizeBits(raw);

  const width = model.getSignal(signal)?.width;
  // Unknown signals keep their text; the stepper rejects them anyway
  if (width === undefined) return raw;
  if (DECIMAL.test(raw)) return fromBigInt(BigInt(raw), width);
  // %d prints x or z for values with unknown bits
  if (/^[xXzZ]$/.test(raw)) return allX(width);
  return raw;
}
