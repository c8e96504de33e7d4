/**
 * Rating/explanation contract
 * An improvement note is null exactly when its rating is "good"
 */

import type { ContractPolicy } from '../config/index.js';
import type { ClassificationVerdict, Rating } from './schema.js';

export type ExplanationField = 'to_improve_understanding' | 'to_improve_performance';

/**
 * One broken rating/explanation pair
 */
export interface ContractIssue {
  field: ExplanationField;
  rating: Rating;
  problem: 'explanation_with_good_rating' | 'missing_explanation';
}

/**
 * Outcome of checking a verdict
 */
export interface ContractCheck {
  verdict: ClassificationVerdict;
  issues: ContractIssue[];
  coerced: boolean;
}

/**
 * Verdict rejected under the "reject" policy
 */
export class ContractViolationError extends Error {
  constructor(public readonly issues: ContractIssue[]) {
    super(`Verdict breaks the rating/explanation contract: ${issues.map(formatIssue).join('; ')}`);
    this.name = 'ContractViolationError';
  }
}

const PAIRS: Array<[ExplanationField, 'bot_understanding' | 'bot_performance']> = [
  ['to_improve_understanding', 'bot_understanding'],
  ['to_improve_performance', 'bot_performance'],
];

export function formatIssue(issue: ContractIssue): string {
  return issue.problem === 'explanation_with_good_rating'
    ? `${issue.field} is set although the rating is good`
    : `${issue.field} is empty although the rating is ${issue.rating}`;
}

/**
 * List every rating/explanation pair that breaks the contract
 */
export function findContractIssues(verdict: ClassificationVerdict): ContractIssue[] {
  const issues: ContractIssue[] = [];

  for (const [field, ratingField] of PAIRS) {
    const rating = verdict[ratingField];
    const explanation = verdict[field];

    if (rating === 'good' && explanation !== null) {
      issues.push({ field, rating, problem: 'explanation_with_good_rating' });
    } else if (rating !== 'good' && (explanation === null || !explanation.trim())) {
      issues.push({ field, rating, problem: 'missing_explanation' });
    }
  }

  return issues;
}

/**
 * Apply the contract policy to a verdict.
 * "coerce" nulls explanations attached to good ratings and reports the rest;
 * "reject" throws on any issue.
 * @throws ContractViolationError
 */
export function enforceVerdictContract(
  verdict: ClassificationVerdict,
  policy: ContractPolicy
): ContractCheck {
  const issues = findContractIssues(verdict);

  if (issues.length === 0) {
    return { verdict, issues, coerced: false };
  }

  if (policy === 'reject') {
    throw new ContractViolationError(issues);
  }

  const repaired: ClassificationVerdict = { ...verdict };
  let coerced = false;

  for (const issue of issues) {
    if (issue.problem === 'explanation_with_good_rating') {
      repaired[issue.field] = null;
      coerced = true;
    }
  }

  return { verdict: repaired, issues, coerced };
}
