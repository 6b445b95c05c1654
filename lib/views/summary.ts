import type { ObservationTable, OpacityTally, SeasonalAggregate } from "@/lib/domain/types";
import { isAbsentColumn, tallyOpacity } from "@/lib/aggregate/opacity";
import { seasonComparison } from "./series";

export type WeatherSummary = {
  records: number;
  droppedRows: number;
  firstDay: string | null;
  lastDay: string | null;
  seasons: SeasonalAggregate[];
  opacity: OpacityTally[] | "absent";
};

export function buildSummary(table: ObservationTable): WeatherSummary {
  const { records, report } = table;
  const tally = tallyOpacity(table);
  return {
    records: records.length,
    droppedRows: report.droppedRows,
    firstDay: records.length > 0 ? records[0].day_key : null,
    lastDay: records.length > 0 ? records[records.length - 1].day_key : null,
    seasons: seasonComparison(records),
    opacity: isAbsentColumn(tally) ? "absent" : tally,
  };
}
