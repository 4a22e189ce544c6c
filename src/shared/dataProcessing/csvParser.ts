import * as csv from "csv-parse/sync";
import type { Metadata } from "../types/index";

export type InputRow = {
  row: number;
  values: { [column: string]: number };
  error?: string;
};

function lineOf(entry: unknown): number | undefined {
  if (typeof entry !== "object" || entry === null || !("info" in entry)) return undefined;
  const { info } = entry;
  if (typeof info !== "object" || info === null || !("lines" in info)) return undefined;
  return typeof info.lines === "number" ? info.lines : undefined;
}

/**
 * Parses a table of crisp inputs: a header row of variable names, then one
 * tuple per line. `row` is the line the tuple sits on, the header being line 1.
 * Rows holding a non-numeric cell carry an `error` instead of failing the
 * whole table.
 */
export function parseInputTable(data: string, metadata: Metadata): InputRow[] {
  const delimiter = metadata.split_char ?? ",";

  if (metadata.decimal_point === ",") {
    if (delimiter === ",")
      throw new Error("Decimal point character is set to ',' but ',' is also the column separator - please set split_char");

    const [header, ...dataLines] = data.split("\n");
    const innerData = dataLines.join("\n").replace(/,/g, ".");

    data = `${header}\n${innerData}`;
  }

  const parsed: unknown = csv.parse(data, {
    columns: true,
    delimiter,
    skip_empty_lines: true,
    trim: true,
    info: true,
  });

  if (!Array.isArray(parsed)) {
    throw new Error("Input table could not be parsed into rows");
  }

  return parsed.map((entry: unknown, index: number): InputRow => {
    const row = lineOf(entry) ?? index + 2;
    const record = typeof entry === "object" && entry !== null && "record" in entry ? entry.record : undefined;
    if (typeof record !== "object" || record === null) {
      return { row, values: {}, error: "Row could not be read" };
    }

    const values: { [column: string]: number } = {};
    const invalid: string[] = [];
    Object.entries(record).forEach(([column, cell]) => {
      const value = typeof cell === "string" && cell !== "" ? Number(cell) : NaN;
      if (Number.isNaN(value)) {
        invalid.push(column);
      } else {
        values[column] = value;
      }
    });

    if (invalid.length > 0) {
      return { row, values, error: `Non-numeric value in column(s) ${invalid.join(", ")}` };
    }
    return { row, values };
  });
}
