import { QualityGateError } from '@waveplan/shared';
import { EvaluationSchema, type Evaluation } from './types';

const RECOMMENDED_FIX_FIELDS = ['section', 'problem', 'idealOutcome'] as const;

export interface EvaluationCheck {
  evaluation: Evaluation;
  /** Non-blocking gaps, such as prompt fixes without an ideal outcome */
  warnings: string[];
}

/**
 * Parses a reflection evaluation. Rejects malformed arrays, unknown failure
 * classes and failures recorded without a prompt fix.
 */
export function validateEvaluation(raw: unknown): EvaluationCheck {
  const parsed = EvaluationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new QualityGateError(`Invalid evaluation: ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  const evaluation = parsed.data;
  if (evaluation.whatFailed.length > 0 && evaluation.promptFixes.length === 0) {
    throw new QualityGateError(
      'whatFailed is non-empty but promptFixes is empty; record a fix for each failure',
    );
  }

  const warnings: string[] = [];
  evaluation.promptFixes.forEach((fix, index) => {
    const missing = RECOMMENDED_FIX_FIELDS.filter((field) => !fix[field]);
    if (missing.length > 0) {
      warnings.push(`promptFixes[${index}] missing: ${missing.join(', ')}`);
    }
  });

  return { evaluation, warnings };
}
