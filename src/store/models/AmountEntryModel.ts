import { types } from "mobx-state-tree";
import type { Digit, KeypadButton } from "../../types";
import { parseAmount } from "../../lib/amount";
import { appConfig } from "../../lib/config";

const ZERO = "0";

export const AmountEntryModel = types
  .model("AmountEntry", {
    displayText: types.optional(types.string, ZERO),
  })
  .views((self) => ({
    get value() {
      return parseAmount(self.displayText) ?? 0;
    },
    get hasDecimalPoint() {
      return self.displayText.includes(".");
    },
    get isZero() {
      return this.value === 0;
    },
    get formatted() {
      return `${appConfig.currencySymbol}${self.displayText}`;
    },
  }))
  .actions((self) => {
    function applyDigit(digit: Digit) {
      const current = parseAmount(self.displayText);
      // "0." keeps its point so the next digit lands after it
      if (current === undefined || (current === 0 && !self.hasDecimalPoint)) {
        self.displayText = String(digit);
      } else {
        self.displayText += String(digit);
      }
    }

    function applyDecimalPoint() {
      if (self.displayText.length === 0 || self.hasDecimalPoint) return;
      self.displayText += ".";
    }

    function applyDelete() {
      if (self.displayText.length === 0) return;
      const next = self.displayText.slice(0, -1);
      const value = parseAmount(next);
      self.displayText = value === undefined || value === 0 ? ZERO : next;
    }

    return {
      applyDigit,
      applyDecimalPoint,
      applyDelete,
      press(button: KeypadButton) {
        if (button.kind === "number") {
          applyDigit(button.value);
        } else if (button.operation === "decimal") {
          applyDecimalPoint();
        } else {
          applyDelete();
        }
      },
      reset() {
        self.displayText = ZERO;
      },
    };
  });
