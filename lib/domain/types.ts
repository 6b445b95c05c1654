// Domain models for canonical Mars weather observations

export type SeasonLabel = "Spring" | "Summer" | "Autumn" | "Winter" | "Unknown";

export type CalendarDate = {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number; // 1-31
};

export type ObservationRecord = {
  readonly date: CalendarDate; // terrestrial (Earth) date
  readonly min_temp: number; // °C
  readonly max_temp: number; // °C
  readonly pressure: number; // Pa
  readonly ls: number; // solar longitude, degrees
  readonly atmospheric_opacity: string | null;
  readonly season: SeasonLabel;
  readonly year: number;
  readonly day_key: string; // YYYY-MM-DD
};

export type IngestReport = {
  rowCount: number;
  droppedRows: number;
  errors: { row: number; message: string }[];
  unknownColumns: string[];
  parseWarnings: string[];
};

export type ObservationTable = {
  readonly records: readonly ObservationRecord[];
  readonly columns: readonly string[]; // normalized, alias-resolved header
  readonly report: IngestReport;
};

export type SeasonalAggregate = {
  readonly season: SeasonLabel;
  readonly count: number;
  readonly min_temp: number; // mean
  readonly max_temp: number; // mean
  readonly pressure: number; // mean
};

export type OpacityTally = {
  readonly atmospheric_opacity: string;
  readonly count: number;
};

export type AbsentColumn = {
  readonly kind: "absent_column";
  readonly column: "atmospheric_opacity";
};
