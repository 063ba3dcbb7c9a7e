import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { LedgerError } from "./errors.js";

const ParsedRecords = Type.Array(
  Type.Object({
    record: Type.Array(Type.String()),
    info: Type.Object({ lines: Type.Number() }),
  }),
);

export interface CsvRecord {
  /** 1-based line in the file where the record ends; the header is line 1. */
  line: number;
  fields: string[];
}

/**
 * Parse CSV text into records, dropping the header line and blank lines.
 * Short and long rows are kept as they are; row parsers check the width.
 * A quote inside an unquoted field is kept as text. Text the parser cannot
 * read at all throws a `MALFORMED_CSV` LedgerError.
 */
export function parseCsvRecords(content: string): CsvRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      from_line: 2,
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    if (err instanceof CsvError) {
      throw new LedgerError("MALFORMED_CSV", err.message, { parserCode: err.code });
    }
    throw err;
  }
  if (!Value.Check(ParsedRecords, parsed)) {
    throw new LedgerError("MALFORMED_CSV", "CSV parser returned records that are not rows of strings");
  }
  return parsed.map((entry: Static<typeof ParsedRecords>[number]) => ({
    line: entry.info.lines,
    fields: entry.record,
  }));
}
