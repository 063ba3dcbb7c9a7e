import { parseIsoDate } from "../ledger/dates.js";
import type { OptionPosition, OptionStatus, OptionTransaction } from "./option-position.js";

/** A Buy to Close whose notes mention a roll (any case) closes the leg as Rolled. */
export function isRollNote(notes: string): boolean {
  return notes.toLowerCase().includes("roll");
}

/**
 * Status after applying `tx`. Only an Open position changes status;
 * once terminal, later transactions leave it as it is.
 */
export function nextStatus(current: OptionStatus, tx: OptionTransaction): OptionStatus {
  if (current !== "Open") {
    return current;
  }
  switch (tx.action) {
    case "Sell to Open":
      return "Open";
    case "Buy to Close":
      return isRollNote(tx.notes) ? "Rolled" : "Closed Early";
    case "Expired":
    case "Assigned":
    case "Exercised":
      return tx.action;
  }
}

/** True once `now` is past midnight at the start of the expiry date. */
export function isPastExpiry(expiry: string, now: Date): boolean {
  const expiryDate = parseIsoDate(expiry);
  return expiryDate !== undefined && now.getTime() > expiryDate.getTime();
}

/**
 * Read-time projection: an Open position with no close whose expiry has
 * passed is reported Expired on its expiry date. Returns the input when
 * nothing changes.
 */
export function projectExpiry<T extends Pick<OptionPosition, "status" | "closeDate" | "expiry">>(
  position: T,
  now: Date,
): T {
  if (position.status !== "Open" || position.closeDate !== "" || !isPastExpiry(position.expiry, now)) {
    return position;
  }
  return { ...position, status: "Expired", closeDate: position.expiry };
}
