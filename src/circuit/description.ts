// Circuit descriptions: JSON documents compiled into a CircuitModel
//
// Guards, next values and output drives are rule expressions; see
// src/parser for the grammar.

import { z } from 'zod';
import { CircuitError, CircuitErrorType, ExpressionError } from '../errors.js';
import { truthOf, type UnknownMode } from '../logic/four-state.js';
import { compileExpression, type CompiledExpression } from '../simulator/evaluator.js';
import { CircuitModel } from './model.js';

const NameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');
const WidthSchema = z.number().int().positive().default(1);

const SignalSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('input'),
    name: NameSchema,
    width: WidthSchema,
  }),
  z.object({
    kind: z.literal('register'),
    name: NameSchema,
    width: WidthSchema,
    reset: z.string().optional(),
    visible: z.boolean().default(true),
  }),
  z.object({
    kind: z.literal('output'),
    name: NameSchema,
    width: WidthSchema,
    drive: z.string().min(1),
  }),
]);

const RuleSchema = z.object({
  register: NameSchema,
  priority: z.number().int(),
  label: z.string().min(1).optional(),
  when: z.string().min(1),
  next: z.string().min(1),
});

const AmbiguitySchema = z.object({
  register: NameSchema,
  label: z.string().min(1),
  when: z.string().min(1),
});

export const CircuitDescriptionSchema = z.object({
  name: z.string().min(1),
  unknowns: z.enum(['exact', 'structural']).default('structural'),
  signals: z.array(SignalSchema).min(1),
  reset: z
    .object({
      signal: NameSchema,
      activeLevel: z.enum(['0', '1']).default('1'),
    })
    .optional(),
  rules: z.array(RuleSchema).default([]),
  ambiguities: z.array(AmbiguitySchema).default([]),
});

// Shape accepted as input (defaults not yet applied)
export type CircuitDescription = z.input<typeof CircuitDescriptionSchema>;

/**
 * Validate a description and build the model it describes
 */
export function buildCircuit(description: unknown): CircuitModel {
  const parsed = CircuitDescriptionSchema.safeParse(description);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new CircuitError(
      CircuitErrorType.INVALID_DESCRIPTION,
      `Invalid circuit description: ${issues.join('; ')}`
    );
  }

  const desc = parsed.data;
  const model = new CircuitModel(desc.name, { unknowns: desc.unknowns });
  const mode = desc.unknowns;

  // Rules and drives may read inputs and registers, never outputs
  const readable = new Set(
    desc.signals.filter((s) => s.kind !== 'output').map((s) => s.name)
  );

  for (const sig of desc.signals) {
    switch (sig.kind) {
      case 'input':
        model.declare({ kind: 'input', name: sig.name, width: sig.width });
        break;
      case 'register':
        model.declare({
          kind: 'register',
          name: sig.name,
          width: sig.width,
          reset: sig.reset ?? '0'.repeat(sig.width),
          visible: sig.visible,
        });
        break;
      case 'output': {
        const drive = compile(sig.drive, `output '${sig.name}'`, readable, mode);
        model.declare({
          kind: 'output',
          name: sig.name,
          width: sig.width,
          drive: (env) => drive.evaluate(env),
          source: sig.drive,
        });
        break;
      }
    }
  }

  if (desc.reset) {
    model.setReset(desc.reset);
  }

  for (const rule of desc.rules) {
    const where = `rule '${rule.label ?? rule.when}' of '${rule.register}'`;
    const guard = compile(rule.when, where, readable, mode);
    const next = compile(rule.next, where, readable, mode);
    model.addRule(rule.register, {
      priority: rule.priority,
      label: rule.label,
      guard: (env) => truthOf(guard.evaluate(env), mode),
      next: (_current, env) => next.evaluate(env),
      guardSource: rule.when,
      nextSource: rule.next,
    });
  }

  for (const ambiguity of desc.ambiguities) {
    const guard = compile(ambiguity.when, `ambiguity '${ambiguity.label}'`, readable, mode);
    model.declareAmbiguity(ambiguity.register, {
      label: ambiguity.label,
      guard: (env) => truthOf(guard.evaluate(env), mode),
      guardSource: ambiguity.when,
    });
  }

  return model;
}

function compile(
  source: string,
  where: string,
  readable: ReadonlySet<string>,
  mode: UnknownMode
): CompiledExpression {
  let expr: CompiledExpression;
  try {
    expr = compileExpression(source, mode);
  } catch (e) {
    if (e instanceof ExpressionError) {
      throw new CircuitError(CircuitErrorType.INVALID_DESCRIPTION, `${where}: ${e.message}`);
    }
    throw e;
  }

  for (const name of expr.identifiers) {
    if (!readable.has(name)) {
      throw new CircuitError(
        CircuitErrorType.UNKNOWN_SIGNAL,
        `${where}: '${name}' is not a declared input or register`
      );
    }
  }
  return expr;
}
