import { describe, it, expect } from "vitest";
import { parseCsvRecords, type CsvRecord } from "./csv.js";
import {
  parseFundingRecords,
  parseOptionRecords,
  parseStockRecords,
  parseVixRecords,
  toPriceMap,
} from "./records.js";

function records(...rows: string[][]): CsvRecord[] {
  return rows.map((fields, index) => ({ line: index + 2, fields }));
}

describe("parseCsvRecords", () => {
  it("should drop the header, blank lines and a byte-order mark", () => {
    const content = '\uFEFFDate,Type\n\n2024-01-02, Buy \n"a,b",c\n';

    expect(parseCsvRecords(content)).toEqual([
      { line: 3, fields: ["2024-01-02", "Buy"] },
      { line: 4, fields: ["a,b", "c"] },
    ]);
  });

  it("should keep a quote inside an unquoted field as text", () => {
    expect(parseCsvRecords('Notes,Id\nRolled to the 5" wide spread,P1\n')).toEqual([
      { line: 2, fields: ['Rolled to the 5" wide spread', "P1"] },
    ]);
  });

  it("should throw a MALFORMED_CSV error for an unterminated quoted field", () => {
    expect(() => parseCsvRecords('A,B\n"open,1\n')).toThrow(
      expect.objectContaining({ name: "LedgerError", code: "MALFORMED_CSV" }),
    );
  });

  it("should keep rows of uneven width", () => {
    expect(parseCsvRecords("A,B,C\n1\n1,2,3,4\n").map((r) => r.fields)).toEqual([
      ["1"],
      ["1", "2", "3", "4"],
    ]);
  });
});

describe("parseFundingRecords", () => {
  it("should accept long-form and ISO dates", () => {
    const result = parseFundingRecords(
      records(["August 25 2025", "Deposit", "$1,234.50"], ["2025-09-01", "Withdrawal", "200"]),
    );

    expect(result.records).toEqual([
      { date: "2025-08-25", type: "Deposit", amount: 1234.5 },
      { date: "2025-09-01", type: "Withdrawal", amount: 200 },
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it("should reject an amount that is not currency", () => {
    const result = parseFundingRecords(records(["2025-09-01", "Deposit", "$abc"]));

    expect(result.records).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        source: "transactions.csv",
        row: 2,
        record: ["2025-09-01", "Deposit", "$abc"],
        code: "INVALID_NUMBER",
        message: 'Amount "$abc" is not a currency amount',
      },
    ]);
  });
});

describe("parseStockRecords", () => {
  it("should default a missing commission to 0 and id rows by their line number", () => {
    const result = parseStockRecords(
      records(
        ["2024-01-02", "Buy", "nvda", "2", "500", "1000"],
        ["2024-01-03", "Sell", "NVDA", "1", "520", "520", "0.5"],
      ),
    );

    expect(result.records.map((r) => [r.symbol, r.commission, r.transactionId])).toEqual([
      ["NVDA", 0, "2"],
      ["NVDA", 0.5, "3"],
    ]);
  });

  it("should keep line-number ids across blank lines", () => {
    const content = [
      "Date,Type,Symbol,Shares,Price,Amount",
      "2024-01-02,Buy,NVDA,2,500,1000",
      "",
      "2024-01-03,Sell,NVDA,1,520,520",
    ].join("\n");

    const result = parseStockRecords(parseCsvRecords(content));

    expect(result.records.map((r) => r.transactionId)).toEqual(["2", "4"]);
  });

  it("should reject zero shares and impossible dates", () => {
    const result = parseStockRecords(
      records(["2024-01-02", "Buy", "AAPL", "0", "1", "0"], ["2024-13-01", "Buy", "AAPL", "1", "1", "1"]),
    );

    expect(result.records).toEqual([]);
    expect(result.diagnostics.map((d) => [d.row, d.code, d.message])).toEqual([
      [2, "INVALID_NUMBER", "Shares must be positive, got 0"],
      [3, "INVALID_DATE", 'Date "2024-13-01" is not a YYYY-MM-DD date'],
    ]);
  });
});

describe("parseOptionRecords", () => {
  const row = (action: string, type: string): string[] => [
    "2024-01-10",
    action,
    "SPY",
    type,
    "450",
    "2024-02-16",
    "1",
    "300",
  ];

  it("should accept rows without the trailing optional columns", () => {
    const result = parseOptionRecords(records(row("Sell to Open", "Put")));

    expect(result.records).toEqual([
      {
        date: "2024-01-10",
        action: "Sell to Open",
        symbol: "SPY",
        optionType: "Put",
        strike: 450,
        expiry: "2024-02-16",
        contracts: 1,
        premium: 300,
        stockPrice: 0,
        commission: 0,
        positionId: "",
        notes: "",
      },
    ]);
  });

  it("should reject unknown actions and option types", () => {
    const result = parseOptionRecords(records(row("Buy to Open", "Put"), row("Sell to Open", "call")));

    expect(result.diagnostics.map((d) => d.code)).toEqual(["UNKNOWN_ACTION", "UNKNOWN_TYPE"]);
  });
});

describe("parseVixRecords", () => {
  it("should report an empty reading as a missing field", () => {
    const result = parseVixRecords(records(["2024-06-03", ""]));

    expect(result.diagnostics.map((d) => [d.code, d.message])).toEqual([["MISSING_FIELD", "VIX is empty"]]);
  });
});

describe("toPriceMap", () => {
  it("should let a later row win for a repeated ticker", () => {
    expect(
      toPriceMap([
        { symbol: "AAPL", price: 180 },
        { symbol: "AAPL", price: 185 },
      ]),
    ).toEqual({ AAPL: 185 });
  });
});
