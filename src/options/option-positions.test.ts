import { describe, it, expect } from "vitest";
import { isPastExpiry, isRollNote, projectExpiry } from "./option-lifecycle.js";
import type { OptionTransaction } from "./option-position.js";
import { formatOptionSymbol } from "./option-position.js";
import { buildOptionPositions, calculateOptionPositions } from "./option-positions.js";

// ── Helpers ──

const NOW = new Date(2024, 5, 1, 12, 0, 0); // 2024-06-01 local noon

function optionTx(overrides: Partial<OptionTransaction> = {}): OptionTransaction {
  return {
    date: "2024-03-01",
    action: "Sell to Open",
    symbol: "AAPL",
    optionType: "Put",
    strike: 150,
    expiry: "2024-03-15",
    contracts: 1,
    premium: 250,
    stockPrice: 160,
    commission: 1,
    positionId: "P1",
    notes: "",
    ...overrides,
  };
}

// ── Lifecycle ──

describe("buildOptionPositions", () => {
  it("should close a put early and derive its yield metrics", () => {
    const { positions, diagnostics } = buildOptionPositions(
      [
        optionTx({ premium: 300 }),
        optionTx({ date: "2024-03-08", action: "Buy to Close", premium: -100, commission: 1 }),
      ],
      { now: NOW },
    );

    expect(diagnostics).toEqual([]);
    expect(positions).toHaveLength(1);
    const [p] = positions;
    expect(p.status).toBe("Closed Early");
    expect(p.openDate).toBe("2024-03-01");
    expect(p.closeDate).toBe("2024-03-08");
    expect(p.premiumCollected).toBe(300);
    expect(p.premiumPaid).toBe(100);
    expect(p.commissions).toBe(2);
    expect(p.netPremium).toBe(198);
    expect(p.maxProfit).toBe(300);
    expect(p.capital).toBe(15_000);
    expect(p.daysHeld).toBe(7);
    expect(p.daysToExpiry).toBe(14);
    expect(p.percentReturn).toBeCloseTo(1.32, 10);
    expect(p.annualizedReturn).toBeCloseTo((1.32 / 14) * 365, 10);
  });

  it("should reach the same net premium whichever row of a position comes first", () => {
    const open = optionTx({ premium: 300 });
    const close = optionTx({ date: "2024-03-08", action: "Buy to Close", premium: -100, commission: 1 });

    const inOrder = buildOptionPositions([open, close], { now: NOW });
    const reversed = buildOptionPositions([close, open], { now: NOW });

    for (const { positions } of [inOrder, reversed]) {
      expect(positions).toHaveLength(1);
      expect(positions[0]).toMatchObject({
        status: "Closed Early",
        openDate: "2024-03-01",
        closeDate: "2024-03-08",
        netPremium: 198,
        capital: 15_000,
        daysHeld: 7,
      });
    }
    expect(inOrder.diagnostics).toEqual([]);
    expect(reversed.diagnostics.map((d) => d.code)).toEqual(["UNEXPECTED_OPENING_ACTION"]);
  });

  it("should mark a buy to close with roll in the notes as Rolled", () => {
    const { positions } = buildOptionPositions(
      [
        optionTx(),
        optionTx({ date: "2024-03-10", action: "Buy to Close", premium: -50, notes: "ROLLED out to April" }),
      ],
      { now: NOW },
    );

    expect(positions[0].status).toBe("Rolled");
  });

  it.each(["Expired", "Assigned", "Exercised"] as const)(
    "should enter the %s terminal state on that action",
    (action) => {
      const { positions } = buildOptionPositions(
        [optionTx(), optionTx({ date: "2024-03-15", action, premium: 0, commission: 0 })],
        { now: NOW },
      );

      expect(positions[0].status).toBe(action);
      expect(positions[0].closeDate).toBe("2024-03-15");
      expect(positions[0].netPremium).toBe(249);
    },
  );

  it("should keep the first terminal status while later closes still move cash", () => {
    const { positions } = buildOptionPositions(
      [
        optionTx(),
        optionTx({ date: "2024-03-15", action: "Assigned", premium: 0, commission: 0 }),
        optionTx({ date: "2024-03-16", action: "Buy to Close", premium: -20, commission: 0 }),
      ],
      { now: NOW },
    );

    expect(positions[0].status).toBe("Assigned");
    expect(positions[0].closeDate).toBe("2024-03-16");
    expect(positions[0].premiumPaid).toBe(20);
  });

  it("should project an unclosed position past expiry as Expired on its expiry date", () => {
    const transactions = [optionTx({ expiry: "2024-05-31" })];

    const before = buildOptionPositions(transactions, { now: new Date(2024, 4, 30, 23, 0, 0) });
    expect(before.positions[0].status).toBe("Open");
    expect(before.positions[0].closeDate).toBe("");
    expect(before.positions[0].daysHeld).toBe(0);

    const after = buildOptionPositions(transactions, { now: NOW });
    expect(after.positions[0].status).toBe("Expired");
    expect(after.positions[0].closeDate).toBe("2024-05-31");
    expect(after.positions[0].daysHeld).toBe(91);

    // the input is untouched, so the projection is recomputed on every call
    expect(transactions[0].action).toBe("Sell to Open");
  });

  it("should price covered-call capital from the stock cost basis with a trade-price fallback", () => {
    const call = optionTx({ optionType: "Call", strike: 200, contracts: 2, stockPrice: 180 });

    const covered = buildOptionPositions([call], { stockCostBasis: { AAPL: 170 }, now: NOW });
    expect(covered.positions[0].capital).toBe(34_000);

    const naked = buildOptionPositions([call], { stockCostBasis: {}, now: NOW });
    expect(naked.positions[0].capital).toBe(36_000);
  });

  it("should floor days to expiry at one for same-day expiries", () => {
    const { positions } = buildOptionPositions([optionTx({ expiry: "2024-03-01" })], { now: NOW });

    expect(positions[0].daysToExpiry).toBe(1);
  });

  it("should skip rows without a position id and flag unexpected opening actions", () => {
    const { positions, diagnostics } = buildOptionPositions(
      [
        optionTx({ positionId: "" }),
        optionTx({ positionId: "P9", date: "2024-03-15", action: "Expired", premium: 0 }),
      ],
      { now: NOW },
    );

    expect(positions.map((p) => p.positionId)).toEqual(["P9"]);
    expect(positions[0].status).toBe("Expired");
    expect(diagnostics.map((d) => d.code)).toEqual(["UNEXPECTED_OPENING_ACTION"]);
  });

  it("should order positions by open date then position id", () => {
    const { positions } = buildOptionPositions(
      [
        optionTx({ positionId: "B", date: "2024-03-02" }),
        optionTx({ positionId: "C", date: "2024-03-01" }),
        optionTx({ positionId: "A", date: "2024-03-02" }),
      ],
      { now: NOW },
    );

    expect(positions.map((p) => p.positionId)).toEqual(["C", "A", "B"]);
  });
});

describe("calculateOptionPositions", () => {
  it("should use the FIFO cost basis of shares still held for calls", () => {
    const { positions } = calculateOptionPositions(
      [optionTx({ optionType: "Call", strike: 200, stockPrice: 190 })],
      [
        {
          date: "2024-01-02",
          type: "Buy",
          symbol: "AAPL",
          shares: 100,
          price: 150,
          amount: 15_000,
          commission: 0,
          transactionId: "1",
        },
        {
          date: "2024-01-03",
          type: "Buy",
          symbol: "AAPL",
          shares: 100,
          price: 170,
          amount: 17_000,
          commission: 0,
          transactionId: "2",
        },
        {
          date: "2024-02-01",
          type: "Sell",
          symbol: "AAPL",
          shares: 100,
          price: 180,
          amount: 18_000,
          commission: 0,
          transactionId: "3",
        },
      ],
      { now: NOW },
    );

    expect(positions[0].capital).toBe(17_000);
  });
});

// ── Helpers of the lifecycle ──

describe("option lifecycle helpers", () => {
  it("should match roll notes case-insensitively", () => {
    expect(isRollNote("Roll to May")).toBe(true);
    expect(isRollNote("taking profit")).toBe(false);
  });

  it("should treat expiry as passed only after midnight at its start", () => {
    expect(isPastExpiry("2024-06-01", new Date(2024, 5, 1, 0, 0, 0))).toBe(false);
    expect(isPastExpiry("2024-06-01", new Date(2024, 5, 1, 0, 0, 1))).toBe(true);
    expect(isPastExpiry("not-a-date", NOW)).toBe(false);
  });

  it("should leave closed positions alone when projecting", () => {
    const position = { status: "Closed Early" as const, closeDate: "2024-01-05", expiry: "2024-01-19" };

    expect(projectExpiry(position, NOW)).toBe(position);
  });

  it("should format the contract symbol", () => {
    expect(
      formatOptionSymbol({ symbol: "NVDA", optionType: "Put", strike: 800, expiry: "2026-02-14" }),
    ).toBe("NVDA-260214-P-800");
  });
});
