import { z } from 'zod';

export const SKILLS = ['design', 'execute', 'research', 'simplify'] as const;
export const OUTCOMES = ['completed', 'partial', 'failed', 'aborted'] as const;

/** Closed taxonomy of why an instruction did not produce the intended behaviour */
export const FAILURE_CLASSES = [
  'spec-disobey',
  'step-repetition',
  'context-loss',
  'termination-unaware',
  'ignored-peer-input',
  'task-derailment',
  'premature-termination',
  'incorrect-verification',
  'no-verification',
  'reasoning-action-mismatch',
] as const;

export const SkillSchema = z.enum(SKILLS);
export const OutcomeSchema = z.enum(OUTCOMES);
export const FailureClassSchema = z.enum(FAILURE_CLASSES);

export const PromptFixSchema = z.object({
  /** Instruction section the fix applies to */
  section: z.string().optional(),
  problem: z.string().optional(),
  idealOutcome: z.string().optional(),
  fix: z.string().min(1),
  failureClass: FailureClassSchema,
});

export const EvaluationSchema = z
  .object({
    whatWorked: z.array(z.string()).default([]),
    whatFailed: z.array(z.string()).default([]),
    doNextTime: z.array(z.string()).default([]),
    promptFixes: z.array(PromptFixSchema).default([]),
    stepsSkipped: z.array(z.string()).default([]),
    instructionsIgnored: z.array(z.string()).default([]),
  })
  .passthrough();

export const ReflectionEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  skill: SkillSchema,
  goal: z.string(),
  outcome: OutcomeSchema,
  goalAchieved: z.boolean(),
  evaluation: EvaluationSchema,
});

export type Skill = z.infer<typeof SkillSchema>;
export type Outcome = z.infer<typeof OutcomeSchema>;
export type FailureClass = z.infer<typeof FailureClassSchema>;
export type PromptFix = z.infer<typeof PromptFixSchema>;
export type Evaluation = z.infer<typeof EvaluationSchema>;
export type ReflectionEntry = z.infer<typeof ReflectionEntrySchema>;
