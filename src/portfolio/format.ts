function withThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/** Whole dollars with thousands separators: 12345.6 → "$12,346", -80 → "-$80". */
export function formatCurrency(amount: number): string {
  const rounded = Math.round(Math.abs(amount));
  const text = `$${withThousands(String(rounded))}`;
  return amount < 0 && rounded !== 0 ? `-${text}` : text;
}

export function formatPercentage(value: number, digits = 2): string {
  return `${value.toFixed(digits)}%`;
}

/** Signed whole dollars: "+$1,200" or "-$300". */
export function formatPnl(amount: number): string {
  const formatted = formatCurrency(amount);
  return formatted.startsWith("-") ? formatted : `+${formatted}`;
}
