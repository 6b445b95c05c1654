export const DEFAULT_DATA_PATH = "data/mars-weather.csv";
export const DATA_PATH_ENV = "MARS_WEATHER_CSV";

export const DATE_COLUMN = "terrestrial_date";
export const OPACITY_COLUMN = "atmospheric_opacity";

// Order matters: SchemaError lists missing columns in this order
export const REQUIRED_COLUMNS = [DATE_COLUMN, "min_temp", "max_temp", "pressure", "ls"] as const;

// Cell values treated as missing, compared case-insensitively after trimming
export const MISSING_MARKERS: ReadonlySet<string> = new Set([
  "",
  "na",
  "n/a",
  "nan",
  "-nan",
  "null",
  "none",
  "#n/a",
]);
