import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';

// ── Selectors ────────────────────────────────────────────────

export const selectorStrategySchema = z.enum(['testid', 'role', 'text', 'css']);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

/**
 * Where a step acts. Models write a `role` target's ARIA role either in
 * `role` or in `value`; parsing moves it into `role`.
 */
export const selectorHintSchema = z
  .object({
    strategy: selectorStrategySchema,
    value: z.string().min(1),
    role: z.string().min(1).optional(),
    name: z.string().optional(),
  })
  .transform((hint) =>
    hint.strategy === 'role' && hint.role === undefined ? { ...hint, role: hint.value } : hint,
  );

export type SelectorHint = z.infer<typeof selectorHintSchema>;

// ── Steps ────────────────────────────────────────────────────
// The sandbox caps every step at the time its script has left; this bound
// only rejects values no run could honour.

const stepTimeoutSchema = z.number().int().positive().max(TIMEOUTS.MAX_STEP_TIMEOUT);

const baseStep = z.object({
  description: z.string().min(1),
  timeout: stepTimeoutSchema.optional(),
});

const targetedStep = baseStep.extend({ selector: selectorHintSchema });

export const stepSchema = z.discriminatedUnion('type', [
  baseStep.extend({ type: z.literal('goto'), value: z.string().min(1) }),
  targetedStep.extend({ type: z.literal('click') }),
  targetedStep.extend({ type: z.literal('type'), value: z.string() }),
  targetedStep.extend({ type: z.literal('select'), value: z.string() }),
  targetedStep.extend({ type: z.literal('upload'), value: z.string().min(1) }),
  baseStep.extend({
    type: z.literal('wait'),
    selector: selectorHintSchema.optional(),
    /** Milliseconds to pause when there is no selector to wait for. */
    value: z.string().optional(),
  }),
  baseStep.extend({
    type: z.literal('expect_text'),
    selector: selectorHintSchema.optional(),
    value: z.string().min(1),
  }),
  baseStep.extend({ type: z.literal('press_key'), value: z.string().min(1) }),
]);

export type Step = z.infer<typeof stepSchema>;
export type StepType = Step['type'];
export type WaitStep = Extract<Step, { type: 'wait' }>;

/** A script: the JSON step list the synthesizer writes and the sandbox runs. */
export const stepListSchema = z.array(stepSchema).min(1);
