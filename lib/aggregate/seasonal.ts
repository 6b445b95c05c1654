import type { ObservationRecord, SeasonalAggregate, SeasonLabel } from "@/lib/domain/types";
import { compareSeasons } from "@/lib/mars/season";

type Sums = { count: number; min_temp: number; max_temp: number; pressure: number };

/**
 * Mean min/max temperature and pressure per realized season.
 * Groups come out in order of first appearance; use sortBySeasonOrder for display.
 */
export function aggregateBySeason(records: readonly ObservationRecord[]): SeasonalAggregate[] {
  const groups = new Map<SeasonLabel, Sums>();
  for (const r of records) {
    const g = groups.get(r.season) ?? { count: 0, min_temp: 0, max_temp: 0, pressure: 0 };
    g.count += 1;
    g.min_temp += r.min_temp;
    g.max_temp += r.max_temp;
    g.pressure += r.pressure;
    groups.set(r.season, g);
  }

  const out: SeasonalAggregate[] = [];
  for (const [season, g] of groups) {
    out.push(
      Object.freeze({
        season,
        count: g.count,
        min_temp: g.min_temp / g.count,
        max_temp: g.max_temp / g.count,
        pressure: g.pressure / g.count,
      })
    );
  }
  return out;
}

export function sortBySeasonOrder(aggregates: readonly SeasonalAggregate[]): SeasonalAggregate[] {
  return [...aggregates].sort((a, b) => compareSeasons(a.season, b.season));
}
