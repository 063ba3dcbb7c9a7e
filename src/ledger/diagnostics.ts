export type DiagnosticCode =
  | "INVALID_DATE"
  | "INVALID_NUMBER"
  | "UNKNOWN_TYPE"
  | "UNKNOWN_ACTION"
  | "MISSING_FIELD"
  | "SHORT_ROW"
  | "MALFORMED_CSV"
  | "INSUFFICIENT_LOTS"
  | "UNEXPECTED_OPENING_ACTION";

/** A skipped row or an accounting anomaly, reported instead of thrown. */
export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Source file name, e.g. "stocks_transactions.csv". */
  source?: string;
  /** 1-based line number in the source file (header is line 1). */
  row?: number;
  record?: string[];
}

export interface ParseResult<T> {
  records: T[];
  diagnostics: Diagnostic[];
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.source ? `${d.source}${d.row !== undefined ? `:${d.row}` : ""} ` : "";
  return `${where}[${d.code}] ${d.message}`;
}
