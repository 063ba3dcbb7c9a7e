export { LedgerStore, LEDGER_FILES } from "./ledger-store.js";
export type { LedgerData } from "./ledger-store.js";
export { LedgerError, InsufficientLotsError } from "./errors.js";
export { formatDiagnostic } from "./diagnostics.js";
export type { Diagnostic, DiagnosticCode, ParseResult } from "./diagnostics.js";
export { parseCsvRecords } from "./csv.js";
export type { CsvRecord } from "./csv.js";
export type { PriceRow, SectorRow, SavingsRow, VixRow } from "./records.js";
