import { readFileSync } from "fs";
import type { ObservationTable } from "@/lib/domain/types";
import { REQUIRED_COLUMNS } from "@/lib/config";
import { parseCsvText } from "./parse";
import { ObservationCsvSchema } from "./schemas";
import { COLUMN_ALIASES } from "./aliases";
import { normalizeObservations } from "./normalize";
import { SourceNotFoundError } from "./errors";

/**
 * Reads a Mars weather CSV from disk and returns the cleaned observation table.
 * Throws SourceNotFoundError before any parsing if the file cannot be read,
 * and SchemaError if a required column is absent from the header.
 */
export function loadAndNormalize(source: string): ObservationTable {
  let text: string;
  try {
    text = readFileSync(source, "utf8");
  } catch (e) {
    throw new SourceNotFoundError(source, { cause: e });
  }
  return normalizeCsvText(text, source);
}

export function normalizeCsvText(text: string, label = "<memory>"): ObservationTable {
  const rep = parseCsvText(text, ObservationCsvSchema, {
    aliases: COLUMN_ALIASES,
    required: REQUIRED_COLUMNS,
  });
  const records = Object.freeze(normalizeObservations(rep.rows));

  let summary = `[ingest] ${label}: kept ${records.length}/${rep.rowCount} rows`;
  if (rep.unknownColumns.length > 0) summary += `; ignored columns: ${rep.unknownColumns.join(", ")}`;
  if (rep.droppedRows > 0) console.warn(`${summary}; dropped ${rep.droppedRows}`);
  else console.debug(summary);

  return Object.freeze({
    records,
    columns: Object.freeze(rep.columns),
    report: {
      rowCount: rep.rowCount,
      droppedRows: rep.droppedRows,
      errors: rep.errors,
      unknownColumns: rep.unknownColumns,
      parseWarnings: rep.parseWarnings,
    },
  });
}
