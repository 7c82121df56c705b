/**
 * Display formatting for values interpolated into feedback text.
 */

export type ValueFormat = "plain" | "decimal1" | "decimal2" | "percent" | "currency";

const currencyFormatter = new Intl.NumberFormat("en-IN", {
  maximumFractionDigits: 0,
});

/**
 * Formats a rupee amount with Indian digit grouping, e.g. 1500000 -> "15,00,000"
 */
export function formatRupees(amount: number): string {
  return currencyFormatter.format(Math.round(amount));
}

export function formatValue(value: number, format: ValueFormat): string {
  switch (format) {
    case "decimal1":
      return value.toFixed(1);
    case "decimal2":
      return value.toFixed(2);
    case "percent":
      return `${Math.round(value * 100)}%`;
    case "currency":
      return formatRupees(value);
    case "plain":
      return String(value);
  }
}
