import type { ObservationRecord } from "@/lib/domain/types";
import { classifySeason } from "@/lib/mars/season";
import type { ObservationCsv } from "./schemas";
import { formatDayKey } from "./dates";

export function normalizeObservations(rows: ObservationCsv[]): ObservationRecord[] {
  return rows.map((r) =>
    Object.freeze({
      date: r.terrestrial_date,
      min_temp: r.min_temp,
      max_temp: r.max_temp,
      pressure: r.pressure,
      ls: r.ls,
      atmospheric_opacity: r.atmospheric_opacity,
      season: classifySeason(r.ls),
      year: r.terrestrial_date.year,
      day_key: formatDayKey(r.terrestrial_date),
    })
  );
}
