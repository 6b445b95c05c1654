import type { SeasonLabel } from "@/lib/domain/types";

export const SEASON_ORDER: readonly SeasonLabel[] = ["Spring", "Summer", "Autumn", "Winter", "Unknown"];

// Half-open [from, to) bands of solar longitude, checked in order
const SEASON_BANDS: readonly { from: number; to: number; season: SeasonLabel }[] = [
  { from: 0, to: 90, season: "Spring" },
  { from: 90, to: 180, season: "Summer" },
  { from: 180, to: 270, season: "Autumn" },
  { from: 270, to: 360, season: "Winter" },
];

/**
 * Maps solar longitude (Ls, degrees) to a Martian season.
 * No wraparound: negative, >= 360 and non-finite values are "Unknown".
 */
export function classifySeason(ls: number): SeasonLabel {
  if (!Number.isFinite(ls)) return "Unknown";
  for (const band of SEASON_BANDS) {
    if (ls >= band.from && ls < band.to) return band.season;
  }
  return "Unknown";
}

export function compareSeasons(a: SeasonLabel, b: SeasonLabel): number {
  return SEASON_ORDER.indexOf(a) - SEASON_ORDER.indexOf(b);
}
