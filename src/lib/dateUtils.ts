import { format } from "date-fns";

/**
 * Parse an ISO date string (YYYY-MM-DD) as a local date without timezone conversion
 */
export function parseLocalDate(dateStr: string): Date {
  const [year, month, day] = dateStr.split("-").map(Number);
  return new Date(year, month - 1, day);
}

/** Value for an `<input type="date">`. */
export function toDateInputValue(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function formatDate(dateStr: string, pattern = "MMM d, yyyy"): string {
  return format(parseLocalDate(dateStr), pattern);
}
