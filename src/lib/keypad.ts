import type { Digit, KeypadButton } from "../types";

const digit = (value: Digit): KeypadButton => ({ kind: "number", value });

export const DECIMAL_BUTTON: KeypadButton = {
  kind: "operation",
  operation: "decimal",
};

export const DELETE_BUTTON: KeypadButton = {
  kind: "operation",
  operation: "delete",
};

export const KEYPAD_ROWS: readonly (readonly KeypadButton[])[] = [
  [digit(1), digit(2), digit(3)],
  [digit(4), digit(5), digit(6)],
  [digit(7), digit(8), digit(9)],
  [DECIMAL_BUTTON, digit(0), DELETE_BUTTON],
];

/** Accessible name of a key; the delete key renders an icon, so it needs one. */
export function keypadButtonLabel(button: KeypadButton): string {
  if (button.kind === "number") return String(button.value);
  return button.operation === "decimal" ? "Decimal point" : "Delete";
}

export function keypadButtonKey(button: KeypadButton): string {
  return button.kind === "number" ? `digit-${button.value}` : button.operation;
}
