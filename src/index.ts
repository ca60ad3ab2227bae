// rtl-trace-check - synchronous circuit simulator and trace consistency checker

// Four-state logic
export * from './logic/four-state.js';

// Errors
export {
  CircuitError,
  CircuitErrorType,
  TraceError,
  TraceErrorType,
  ExpressionError,
} from './errors.js';

// Circuit model and descriptions
export { CircuitModel, type CircuitOptions } from './circuit/model.js';
export {
  buildCircuit,
  CircuitDescriptionSchema,
  type CircuitDescription,
} from './circuit/description.js';
export {
  createShiftCountCircuit,
  createJkFsmCircuit,
  createXorAndCircuit,
  JK_FSM,
  XOR_AND,
  REFERENCE_CIRCUITS,
} from './circuit/reference.js';

// Rule expressions
export { Lexer, tokenize, type Token, type TokenType } from './parser/lexer.js';
export { Parser, parseExpression, parseSizedLiteral } from './parser/parser.js';
export { compileExpression, evaluate, type CompiledExpression } from './simulator/evaluator.js';

// Simulation
export {
  Stepper,
  type StepperOptions,
  type StepResult,
  type EdgeEvaluation,
  type EdgeOutcome,
  type OutcomeSelector,
  type UndrivenPolicy,
} from './simulator/stepper.js';
export {
  TraceRunner,
  simulatedCycles,
  agrees,
  DEFAULT_MAX_BRANCHES,
  type Branch,
  type RunOptions,
  type SimulatedCycle,
  type SimulatedSegment,
  type SimulatedTrace,
} from './simulator/trace-runner.js';

// Checking
export { ConsistencyChecker, type ExpectedTrace } from './checker/consistency-checker.js';
export { describeCause, explainMismatch } from './checker/explain.js';
export {
  ScenarioOrchestrator,
  summarize,
  type OrchestratorOptions,
} from './checker/orchestrator.js';

// Traces
export { loadScenarios, parseScenarios, toScenarioDocument } from './trace/scenario-loader.js';
export { parseTbout, type TboutOptions, type TboutRadix } from './trace/tbout.js';
export {
  validateSegment,
  segmentCycles,
  flattenSegments,
  cycleLocations,
  toSegment,
} from './trace/segment.js';

// Reports
export {
  formatReport,
  formatSummary,
  formatVerdict,
  toRecord,
  toRecords,
  withSimulatedOutputs,
  type VerdictRecord,
} from './report/format.js';

// Types
export type * from './types/ast.js';
export type * from './types/circuit.js';
export type * from './types/trace.js';
export type * from './types/verdict.js';
