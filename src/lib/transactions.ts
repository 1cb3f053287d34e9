import type {
  TransactionCategory,
  TransactionDetails,
  TransactionDraft,
  TransactionType,
} from "../types";
import { formatDate, toDateInputValue } from "./dateUtils";

export const TRANSACTION_TYPES: readonly TransactionType[] = [
  "income",
  "expense",
];

export const TRANSACTION_CATEGORIES: readonly TransactionCategory[] = [
  "none",
  "food",
  "entertainment",
  "clothing",
  "transportation",
  "health",
  "other",
];

export function optionLabel(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function createDetails(today: Date = new Date()): TransactionDetails {
  return {
    name: "",
    type: "income",
    category: "none",
    date: toDateInputValue(today),
  };
}

/** One-line summary used when a draft is announced. */
export function describeDraft(draft: TransactionDraft): string {
  return [
    draft.name.trim(),
    optionLabel(draft.type),
    draft.category === "none" ? "" : optionLabel(draft.category),
    formatDate(draft.date),
  ]
    .filter((part) => part.length > 0)
    .join(" · ");
}
