// Scenario orchestrator: evaluates scenarios one by one against one circuit model

import { CircuitModel } from '../circuit/model.js';
import { TraceError, TraceErrorType } from '../errors.js';
import { TraceRunner, type SimulatedTrace } from '../simulator/trace-runner.js';
import type { StepperOptions } from '../simulator/stepper.js';
import { ConsistencyChecker } from './consistency-checker.js';
import type { Scenario } from '../types/trace.js';
import type { EvaluationReport, Verdict } from '../types/verdict.js';

export type OrchestratorOptions = StepperOptions;

export class ScenarioOrchestrator {
  private model: CircuitModel;
  private runner: TraceRunner;
  private checker = new ConsistencyChecker();

  constructor(model: CircuitModel, options: OrchestratorOptions = {}) {
    this.model = model;
    this.runner = new TraceRunner(model, options);
  }

  /**
   * Evaluate one scenario from a freshly reset model.
   * Trace defects make the scenario inconclusive; circuit errors propagate.
   */
  evaluateScenario(scenario: Scenario): Verdict {
    try {
      if (!scenario.outputs) {
        throw new TraceError(
          TraceErrorType.INVALID_TRACE,
          `Scenario '${scenario.name}' has no expected outputs`
        );
      }
      const expected = this.checker.prepare(scenario.outputs, this.model.listObserved());
      const simulated = this.runner.run(scenario.inputs, { expected: expected.cycles });
      return { scenario: scenario.name, ...this.checker.compare(simulated, expected) };
    } catch (e) {
      if (e instanceof TraceError) {
        return {
          scenario: scenario.name,
          status: 'inconclusive',
          matches: false,
          error: { type: e.type, message: e.message },
        };
      }
      throw e;
    }
  }

  /**
   * Evaluate every scenario in order
   */
  evaluate(scenarios: readonly Scenario[]): EvaluationReport {
    return summarize(scenarios.map((scenario) => this.evaluateScenario(scenario)));
  }

  /**
   * Evaluate scenarios, yielding to the event loop between them.
   * Verdicts keep the input order.
   */
  async evaluateAsync(
    scenarios: readonly Scenario[],
    onProgress?: (completed: number, total: number) => void
  ): Promise<EvaluationReport> {
    const verdicts: Verdict[] = [];

    for (const scenario of scenarios) {
      verdicts.push(this.evaluateScenario(scenario));

      if (onProgress) {
        onProgress(verdicts.length, scenarios.length);
      }

      // Yield to event loop
      await new Promise((resolve) => setTimeout(resolve, 0));
    }

    return summarize(verdicts);
  }

  /**
   * Simulate a scenario's inputs without checking, e.g. to produce the
   * expected outputs for a stimulus-only trace
   */
  simulate(scenario: Scenario): SimulatedTrace {
    return this.runner.run(scenario.inputs);
  }
}

export function summarize(verdicts: Verdict[]): EvaluationReport {
  let passed = 0;
  let failed = 0;
  let inconclusive = 0;
  for (const verdict of verdicts) {
    if (verdict.status === 'match') passed++;
    else if (verdict.status === 'mismatch') failed++;
    else inconclusive++;
  }
  return { total: verdicts.length, passed, failed, inconclusive, verdicts };
}
