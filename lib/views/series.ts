import type { ObservationRecord, SeasonalAggregate } from "@/lib/domain/types";
import { aggregateBySeason, sortBySeasonOrder } from "@/lib/aggregate/seasonal";

// Chart-ready shapes for the rendering layer. Nothing here draws or writes files.

export type TemperaturePoint = { day_key: string; min_temp: number; max_temp: number };
export type PressurePoint = { day_key: string; pressure: number };
export type PolarPoint = { ls: number; min_temp: number; max_temp: number; pressure: number };
export type YearFrame = { year: number; points: { day_key: string; max_temp: number }[] };

export function temperatureSeries(records: readonly ObservationRecord[]): TemperaturePoint[] {
  return records.map((r) => ({ day_key: r.day_key, min_temp: r.min_temp, max_temp: r.max_temp }));
}

export function pressureSeries(records: readonly ObservationRecord[]): PressurePoint[] {
  return records.map((r) => ({ day_key: r.day_key, pressure: r.pressure }));
}

// Ascending Ls; ties keep source order
export function polarClimate(records: readonly ObservationRecord[]): PolarPoint[] {
  return records
    .map((r) => ({ ls: r.ls, min_temp: r.min_temp, max_temp: r.max_temp, pressure: r.pressure }))
    .sort((a, b) => a.ls - b.ls);
}

/** One animation frame per Earth year, ascending; points keep source order within a frame. */
export function yearlyFrames(records: readonly ObservationRecord[]): YearFrame[] {
  const byYear = new Map<number, YearFrame>();
  for (const r of records) {
    let frame = byYear.get(r.year);
    if (!frame) {
      frame = { year: r.year, points: [] };
      byYear.set(r.year, frame);
    }
    frame.points.push({ day_key: r.day_key, max_temp: r.max_temp });
  }
  return Array.from(byYear.values()).sort((a, b) => a.year - b.year);
}

export function seasonComparison(records: readonly ObservationRecord[]): SeasonalAggregate[] {
  return sortBySeasonOrder(aggregateBySeason(records));
}
