import Papa from "papaparse";
import { z } from "zod";
import { SchemaError } from "./errors";
import { normalizeHeader } from "./aliases";

export type ParseReport<T> = {
  rows: T[];
  columns: string[];
  errors: { row: number; message: string }[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
  parseWarnings: string[];
};

export type ParseOptions = {
  aliases: Record<string, string>;
  required: readonly string[];
};

// CSV parser with header normalization, aliasing and row validation
export function parseCsvText<T extends z.ZodRawShape>(
  text: string,
  schema: z.ZodObject<T>,
  options: ParseOptions
): ParseReport<z.infer<z.ZodObject<T>>> {
  const result = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: "greedy",
  });
  const parseWarnings = result.errors.map((e) =>
    e.row === undefined ? e.message : `row ${e.row}: ${e.message}`
  );

  const [header = [], ...body] = result.data;
  const known = new Set(Object.keys(schema.shape));
  const columns = resolveHeader(header, options.aliases, known);
  const missing = options.required.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaError(`Missing required column(s): ${missing.join(", ")}`, missing);
  }

  const unknownColumns = Array.from(new Set(columns.filter((c) => c !== "" && !known.has(c))));

  const rows: z.infer<z.ZodObject<T>>[] = [];
  const errors: { row: number; message: string }[] = [];
  let rowCount = 0;
  let droppedRows = 0;

  for (const cells of body) {
    rowCount += 1;
    const mapped: Record<string, unknown> = {};
    columns.forEach((col, idx) => {
      if (known.has(col)) mapped[col] = cells[idx];
    });

    const parsed = schema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      droppedRows += 1;
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: rowCount, message: msg });
    }
  }

  return { rows, columns, errors, rowCount, droppedRows, unknownColumns, parseWarnings };
}

// Only a schema column may not repeat; repeated unknown columns are ignored like any other
function resolveHeader(header: string[], aliases: Record<string, string>, known: ReadonlySet<string>): string[] {
  const columns: string[] = [];
  for (const raw of header) {
    const norm = normalizeHeader(raw);
    const col = aliases[norm] ?? norm;
    if (known.has(col) && columns.includes(col)) {
      throw new SchemaError(`Duplicate column "${col}" after header normalization`, [col]);
    }
    columns.push(col);
  }
  return columns;
}
