/**
 * Megacounty merging.
 *
 * Counties reporting fewer responses than the threshold on a given day are
 * pooled, per state, into a `<state>000` pseudo-county for that day only.
 * Membership is recomputed from scratch every day; nothing carries over.
 */

import { countyStateCode, megacountyId } from '@/modules/geo/index.js';

import type {
  GroupComputer,
  GroupEstimate,
  IsoDay,
  MegacountyEstimate,
  MegacountyMerge,
  WeightedResponse,
} from './types.js';

const byGeoId = (a: GroupEstimate, b: GroupEstimate): number =>
  a.geoId < b.geoId ? -1 : a.geoId > b.geoId ? 1 : 0;

/**
 * Merges one day's county groups.
 *
 * Below-threshold counties are pooled per state and recomputed with
 * `compute` over their combined contributions (in county id order). A state
 * whose counties are all below the threshold still yields exactly one
 * megacounty row, whatever its pooled size.
 *
 * @param groups - County groups, all for `day`
 * @param threshold - Minimum sample size a county needs to be reported alone
 * @param compute - The unit's statistic function
 */
export function mergeMegacountiesForDay(
  day: IsoDay,
  groups: readonly GroupEstimate[],
  threshold: number,
  compute: GroupComputer
): MegacountyMerge {
  const retained: GroupEstimate[] = [];
  const belowByState = new Map<string, GroupEstimate[]>();

  for (const group of [...groups].sort(byGeoId)) {
    if (group.statistic.sampleSize >= threshold) {
      retained.push(group);
      continue;
    }
    const state = countyStateCode(group.geoId);
    const pending = belowByState.get(state) ?? [];
    pending.push(group);
    belowByState.set(state, pending);
  }

  const megacounties: MegacountyEstimate[] = [];
  for (const state of [...belowByState.keys()].sort()) {
    const members = belowByState.get(state) ?? [];
    const pooled: WeightedResponse[] = members.flatMap((member) => [...member.responses]);
    const statistic = compute(pooled);
    // Members always carry responses, so pooling cannot come back empty.
    if (statistic.isErr()) continue;

    megacounties.push({
      geoId: megacountyId(state),
      day,
      statistic: statistic.value,
      responses: pooled,
      constituents: members.map((member) => member.geoId),
    });
  }

  return { retained, megacounties };
}

/**
 * Applies the per-day merge to county groups spanning many days.
 * Days are processed independently and returned in calendar order.
 */
export function applyMegacounties(
  groups: readonly GroupEstimate[],
  threshold: number,
  compute: GroupComputer
): Map<IsoDay, MegacountyMerge> {
  const byDay = new Map<IsoDay, GroupEstimate[]>();
  for (const group of groups) {
    const sameDay = byDay.get(group.day) ?? [];
    sameDay.push(group);
    byDay.set(group.day, sameDay);
  }

  const merged = new Map<IsoDay, MegacountyMerge>();
  for (const day of [...byDay.keys()].sort()) {
    merged.set(day, mergeMegacountiesForDay(day, byDay.get(day) ?? [], threshold, compute));
  }
  return merged;
}
