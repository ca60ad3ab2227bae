// Human-readable explanations of how a simulated value came about

import { hasUnknown } from '../logic/four-state.js';
import type { Cause, ObservedSignal } from '../types/circuit.js';
import type { Branch } from '../simulator/trace-runner.js';

export function describeCause(cause: Cause): string {
  switch (cause.kind) {
    case 'reset':
      return `took its reset value because '${cause.signal}' was asserted`;
    case 'hold':
      return 'held its value because no update rule guard held';
    case 'unknown':
      return `is partly unknown because the ${cause.detail}`;
    case 'rule': {
      const { rule } = cause;
      const when = rule.guardSource ? ` since ${rule.guardSource} held` : '';
      const chosen = cause.ambiguity ? `, one of the outcomes allowed under '${cause.ambiguity}'` : '';
      return `was updated by rule '${rule.label}' (priority ${rule.priority})${when}${chosen}`;
    }
  }
}

/**
 * Explain a divergence between a simulated and an expected value.
 * `candidates` are all branches the trace could still be on.
 */
export function explainMismatch(
  signal: ObservedSignal,
  branch: Branch,
  expected: string,
  actual: string,
  candidates: readonly Branch[]
): string {
  const parts: string[] = [];

  if (candidates.length > 1) {
    const labels = [...new Set(candidates.flatMap((c) => c.ambiguities))];
    parts.push(
      labels.length > 0
        ? `ambiguous edge (${labels.join(', ')}): none of the ${candidates.length} acceptable outcomes matches`
        : `none of the ${candidates.length} register states left by earlier ambiguous edges matches`
    );
  }

  const cause = branch.causes[signal.name];
  if (signal.kind === 'register' && cause) {
    parts.push(`${signal.name} ${describeCause(cause)}`);
  } else {
    const registers = Object.entries(branch.causes).map(
      ([name, c]) => `${name} ${describeCause(c)}`
    );
    const from = registers.length > 0 ? ` from registers where ${registers.join('; ')}` : '';
    parts.push(`output ${signal.name} is driven combinationally${from}`);
  }

  if (hasUnknown(actual) && !hasUnknown(expected)) {
    parts.push(`an X or Z input leaves the value undetermined but the trace records ${expected}`);
  } else if (hasUnknown(expected) && !hasUnknown(actual)) {
    parts.push(`the trace records an unknown value where the model computes ${actual}`);
  }

  return parts.join('; ');
}
