import { types } from "mobx-state-tree";
import { SheetStore } from "./SheetStore";

export const RootStore = types.model("RootStore", {
  sheetStore: SheetStore,
});

export type IRootStore = ReturnType<typeof RootStore.create>;

/**
 * Creates a root store with a collapsed sheet and a "0" amount.
 */
export function createRootStore(): IRootStore {
  return RootStore.create({
    sheetStore: {
      expanded: false,
      fullScreen: false,
      detailsFocused: false,
      amount: { displayText: "0" },
    },
  });
}
