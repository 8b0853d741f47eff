import { RankOptions } from './interfaces/analytics.interface';
import { ContractViolationError } from './analytics.errors';

/**
 * Keys of T whose values are numbers.
 */
export type NumericKeys<T> = {
  [P in keyof T]-?: T[P] extends number ? P : never;
}[keyof T] &
  string;

function metricValue(entity: object, by: string): number {
  const value: unknown = Reflect.get(entity, by);
  if (typeof value !== 'number') {
    throw new ContractViolationError(
      'rank',
      `Metric '${by}' is not a numeric field of every entity`,
    );
  }
  return value;
}

/**
 * Order entities by a numeric metric.
 *
 * - Stable: ties keep their input order.
 * - Non-finite metric values go last in either direction.
 * - `limit` of 0 (or omitted) or ≥ length returns everything.
 *
 * @throws ContractViolationError for a negative or fractional limit, or a
 *   metric that is not numeric on every entity
 *
 * @example
 * // 3 lowest-fit sites
 * rank(sites, { by: 'rSquared', order: 'asc', limit: 3 });
 */
export function rank<T extends object, K extends NumericKeys<T>>(
  entities: readonly T[],
  options: RankOptions<K>,
): T[] {
  return rankBy(entities, options);
}

function rankBy<T extends object>(
  entities: readonly T[],
  options: RankOptions<string>,
): T[] {
  const limit = options.limit ?? 0;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ContractViolationError(
      'rank',
      `limit must be a non-negative integer (got ${limit})`,
    );
  }
  if (options.order !== 'asc' && options.order !== 'desc') {
    throw new ContractViolationError(
      'rank',
      `order must be 'asc' or 'desc' (got ${String(options.order)})`,
    );
  }

  const direction = options.order === 'asc' ? 1 : -1;
  const decorated = entities.map((entity, index) => ({
    entity,
    index,
    value: metricValue(entity, options.by),
  }));

  decorated.sort((a, b) => {
    const aFinite = Number.isFinite(a.value);
    const bFinite = Number.isFinite(b.value);
    if (aFinite !== bFinite) {
      return aFinite ? -1 : 1;
    }
    if (aFinite && a.value !== b.value) {
      return (a.value - b.value) * direction;
    }
    return a.index - b.index;
  });

  const ranked = decorated.map((d) => d.entity);
  return limit === 0 ? ranked : ranked.slice(0, limit);
}

/**
 * Lowest fit quality first.
 */
export function worstPerformers<T extends { rSquared: number }>(
  entities: readonly T[],
  limit = 0,
): T[] {
  return rankBy(entities, {
    by: 'rSquared',
    order: 'asc',
    limit,
  });
}
