/**
 * SQL twin of `intervalsOverlap` from the domain. Both must change together.
 * `startParam`/`endParam` are placeholders such as `$2`.
 */
export function overlapSql(
  alias: string,
  startParam: string,
  endParam: string,
  allowSameDayTurnover: boolean,
): string {
  return allowSameDayTurnover
    ? `${alias}.start_date < ${endParam}::date AND ${alias}.end_date > ${startParam}::date`
    : `${alias}.start_date <= ${endParam}::date AND ${alias}.end_date >= ${startParam}::date`;
}

export const BLOCKING_STATUSES_SQL = `('reserved','rented')`;
