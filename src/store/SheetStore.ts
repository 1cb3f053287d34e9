import { types } from "mobx-state-tree";
import { AmountEntryModel } from "./models/AmountEntryModel";
import type { SheetMode } from "../types";

export const SheetStore = types
  .model("SheetStore", {
    expanded: types.optional(types.boolean, false),
    fullScreen: types.optional(types.boolean, false),
    detailsFocused: types.optional(types.boolean, false),
    amount: types.optional(AmountEntryModel, {}),
  })
  .views((self) => ({
    get mode(): SheetMode {
      if (!self.expanded) return "collapsed";
      return self.fullScreen ? "fullScreen" : "partial";
    },
    get showKeypad() {
      return !self.detailsFocused;
    },
  }))
  .actions((self) => ({
    open() {
      if (self.expanded) return;
      self.amount.reset();
      self.expanded = true;
    },
    close() {
      self.fullScreen = false;
      self.detailsFocused = false;
      self.expanded = false;
      self.amount.reset();
    },
    expandDetails() {
      if (!self.expanded) return;
      self.fullScreen = true;
    },
    setDetailsFocused(focused: boolean) {
      self.detailsFocused = focused;
    },
  }));
