/**
 * Outcome Categories
 *
 * Ordered classification table mapping recorded outcome labels to a broad
 * outcome category. Rules are checked in order and the first match wins;
 * anything unmatched (including null) is `Unknown`.
 *
 * The table can be replaced from the config file (`categories:`), see
 * cli/lib/config.ts.
 */

import { z } from 'zod';
import type { BroadOutcomeCategory, CellValue, OutcomeCategoryRule } from '../core/types.js';

export const DEFAULT_OUTCOME_CATEGORY_RULES: readonly OutcomeCategoryRule[] = [
  {
    category: 'No Further Action',
    outcomes: [
      'Unable to prosecute suspect',
      'Investigation complete; no suspect identified',
      'Status update unavailable',
    ],
  },
  {
    category: 'Non-criminal Outcome',
    outcomes: [
      'Local resolution',
      'Offender given a caution',
      'Action to be taken by another organisation',
      'Awaiting court outcome',
    ],
  },
  {
    category: 'Public Interest Consideration',
    outcomes: [
      'Further investigation is not in the public interest',
      'Further action is not in the public interest',
      'Formal action is not in the public interest',
    ],
  },
];

/**
 * Schema for a configured rule table
 */
export const OutcomeCategoryRulesSchema = z
  .array(
    z.object({
      category: z.enum([
        'No Further Action',
        'Non-criminal Outcome',
        'Public Interest Consideration',
      ]),
      outcomes: z.array(z.string().min(1)).min(1),
    })
  )
  .min(1);

/**
 * Classify an outcome label
 *
 * Total over its input: every value maps to exactly one category.
 */
export function categorizeOutcome(
  outcome: CellValue | undefined,
  rules: readonly OutcomeCategoryRule[] = DEFAULT_OUTCOME_CATEGORY_RULES
): BroadOutcomeCategory {
  if (typeof outcome !== 'string') return 'Unknown';

  for (const rule of rules) {
    if (rule.outcomes.includes(outcome)) {
      return rule.category;
    }
  }
  return 'Unknown';
}

/**
 * Outcome labels that appear under more than one category
 */
export function findOverlappingOutcomes(rules: readonly OutcomeCategoryRule[]): string[] {
  const owner = new Map<string, string>();
  const overlaps = new Set<string>();

  for (const rule of rules) {
    for (const outcome of rule.outcomes) {
      const existing = owner.get(outcome);
      if (existing !== undefined && existing !== rule.category) {
        overlaps.add(outcome);
      } else {
        owner.set(outcome, rule.category);
      }
    }
  }

  return [...overlaps].sort();
}
