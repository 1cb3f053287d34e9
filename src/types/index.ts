export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type KeypadOperation = "decimal" | "delete";

export type KeypadButton =
  | { kind: "number"; value: Digit }
  | { kind: "operation"; operation: KeypadOperation };

export type TransactionType = "income" | "expense";

export type TransactionCategory =
  | "none"
  | "food"
  | "entertainment"
  | "clothing"
  | "transportation"
  | "health"
  | "other";

export interface TransactionDetails {
  name: string;
  type: TransactionType;
  category: TransactionCategory;
  date: string; // YYYY-MM-DD, local
}

export interface TransactionDraft extends TransactionDetails {
  amount: number;
  amountText: string; // as entered, without the currency symbol
}

export type SheetMode = "collapsed" | "partial" | "fullScreen";
