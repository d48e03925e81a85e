/**
 * DataForSEO filter expressions.
 *
 * A filter is either a single condition `["keyword", "not_like", "%term%"]`
 * or conditions joined by logical operators:
 * `[cond, "and", cond, "and", cond]`. The API accepts at most 8 conditions.
 */

export type FilterCondition = [field: string, operator: string, value: string];

export type FilterExpression = FilterCondition | Array<FilterCondition | 'and' | 'or'>;

export const MAX_FILTER_CONDITIONS = 8;

/**
 * Build a `not_like` filter excluding keywords that contain any negative substring.
 * Returns null when there is nothing to send. Substrings beyond the API limit are
 * left to the local filter applied after the merge.
 */
export function buildNegativeKeywordFilter(
  substrings: readonly string[],
  field: string = 'keyword',
): FilterExpression | null {
  const conditions = substrings
    .filter((s) => s.length > 0)
    .slice(0, MAX_FILTER_CONDITIONS)
    .map((s): FilterCondition => [field, 'not_like', `%${s}%`]);

  const [first] = conditions;
  if (!first) return null;
  if (conditions.length === 1) return first;

  const expression: Array<FilterCondition | 'and'> = [];
  conditions.forEach((condition, i) => {
    if (i > 0) expression.push('and');
    expression.push(condition);
  });
  return expression;
}
