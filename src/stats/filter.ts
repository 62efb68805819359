/**
 * Predicate-based filtering
 */

import { InvalidArgumentError } from './errors.ts'

/**
 * Keep the elements of `sample` for which `predicate` holds, in order
 */
export function filter<T extends number>(
  sample: ArrayLike<T>,
  predicate: (value: T) => boolean
): T[]

/**
 * Keep `sample[i]` wherever `predicate(criteria[i])` holds.
 * `sample` and `criteria` are parallel arrays.
 * @throws InvalidArgumentError when the lengths differ
 */
export function filter<T extends number, C>(
  sample: ArrayLike<T>,
  criteria: ArrayLike<C>,
  predicate: (criterion: C) => boolean
): T[]

export function filter<T extends number, C>(
  sample: ArrayLike<T>,
  criteriaOrPredicate: ArrayLike<C> | ((value: T) => boolean),
  predicate?: (criterion: C) => boolean
): T[] {
  const result: T[] = []

  if (typeof criteriaOrPredicate === 'function') {
    for (let i = 0; i < sample.length; i++) {
      const v = sample[i]!
      if (criteriaOrPredicate(v)) result.push(v)
    }
    return result
  }

  const criteria = criteriaOrPredicate
  if (!predicate) {
    throw new InvalidArgumentError('filter with criteria requires a predicate')
  }
  if (criteria.length !== sample.length) {
    throw new InvalidArgumentError(
      `Criteria and sample must be the same length (${criteria.length} vs ${sample.length})`
    )
  }

  for (let i = 0; i < sample.length; i++) {
    if (predicate(criteria[i]!)) result.push(sample[i]!)
  }
  return result
}
