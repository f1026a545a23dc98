/**
 * Resolve Geographies Use Case
 *
 * Joins every response to its coarse units, once per geography level. The
 * result is shared read-only by all units of that level.
 */

import { err, ok, type Result } from 'neverthrow';

import type { DaySpan } from '../smoothing.js';
import type { ResponseRow, ResponseTable, UnmappedPolicy } from '../types.js';
import type {
  CrosswalkResolver,
  GeoLevel,
  Membership,
  UnmappedGeographyError,
} from '@/modules/geo/index.js';

export interface ResolvedRow {
  readonly row: ResponseRow;
  readonly memberships: readonly Membership[];
}

export interface ResolvedLevel {
  readonly level: GeoLevel;
  /** Mapped rows, in table order */
  readonly rows: readonly ResolvedRow[];
  /** In-scope rows dropped because their key has no entry for this level */
  readonly unmappedRows: number;
}

/**
 * Resolves one level. Under the `drop` policy unmapped rows are left out and
 * counted; under `abort` the first unmapped row fails the run.
 *
 * @param span - When given, rows on days outside it are skipped before
 *   resolution and never counted
 */
export function resolveLevel(
  table: ResponseTable,
  resolver: CrosswalkResolver,
  level: GeoLevel,
  policy: UnmappedPolicy,
  span?: DaySpan
): Result<ResolvedLevel, UnmappedGeographyError> {
  const rows: ResolvedRow[] = [];
  let unmappedRows = 0;

  for (const row of table.rows) {
    if (span !== undefined && (row.day < span.first || row.day > span.last)) continue;

    const memberships = resolver.resolve(row.geoKey, level);
    if (memberships.isErr()) {
      if (policy === 'abort') {
        return err(memberships.error);
      }
      unmappedRows += 1;
      continue;
    }
    rows.push({ row, memberships: memberships.value });
  }

  return ok({ level, rows, unmappedRows });
}

export function resolveGeographies(
  table: ResponseTable,
  resolver: CrosswalkResolver,
  levels: readonly GeoLevel[],
  policy: UnmappedPolicy,
  span?: DaySpan
): Result<ResolvedLevel[], UnmappedGeographyError> {
  const resolved: ResolvedLevel[] = [];
  for (const level of levels) {
    const result = resolveLevel(table, resolver, level, policy, span);
    if (result.isErr()) {
      return err(result.error);
    }
    resolved.push(result.value);
  }
  return ok(resolved);
}
