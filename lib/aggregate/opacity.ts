import type { AbsentColumn, ObservationTable, OpacityTally } from "@/lib/domain/types";
import { OPACITY_COLUMN } from "@/lib/config";

export const ABSENT_COLUMN: AbsentColumn = Object.freeze({
  kind: "absent_column",
  column: OPACITY_COLUMN,
});

export function isAbsentColumn(value: OpacityTally[] | AbsentColumn): value is AbsentColumn {
  return !Array.isArray(value) && value.kind === "absent_column";
}

/**
 * Occurrence count per opacity category, most frequent first (ties keep first-seen order).
 * Returns ABSENT_COLUMN when the source header never had an opacity column,
 * and [] when it did but no surviving row carries a value.
 */
export function tallyOpacity(table: ObservationTable): OpacityTally[] | AbsentColumn {
  if (!table.columns.includes(OPACITY_COLUMN)) return ABSENT_COLUMN;

  const counts = new Map<string, number>();
  for (const r of table.records) {
    if (r.atmospheric_opacity === null) continue;
    counts.set(r.atmospheric_opacity, (counts.get(r.atmospheric_opacity) ?? 0) + 1);
  }

  return Array.from(counts, ([atmospheric_opacity, count]) => Object.freeze({ atmospheric_opacity, count })).sort(
    (a, b) => b.count - a.count
  );
}
