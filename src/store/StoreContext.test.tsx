import { describe, it, expect } from "vitest";
import type { ReactNode } from "react";
import { renderHook, act } from "@testing-library/react";
import { StoreProvider, useStore } from "./StoreContext";
import { createRootStore } from "./RootStore";

describe("StoreContext", () => {
  describe("StoreProvider", () => {
    it("provides the sheet store to children", () => {
      const wrapper = ({ children }: { children: ReactNode }) => (
        <StoreProvider>{children}</StoreProvider>
      );

      const { result } = renderHook(() => useStore(), { wrapper });

      expect(result.current.sheetStore).toBeDefined();
      expect(result.current.sheetStore.amount.displayText).toBe("0");
    });

    it("accepts a custom store", () => {
      const customStore = createRootStore();
      const wrapper = ({ children }: { children: ReactNode }) => (
        <StoreProvider store={customStore}>{children}</StoreProvider>
      );

      const { result } = renderHook(() => useStore(), { wrapper });

      expect(result.current).toBe(customStore);
    });

    it("shares one store when none is provided", () => {
      const wrapper = ({ children }: { children: ReactNode }) => (
        <StoreProvider>{children}</StoreProvider>
      );

      const { result: result1 } = renderHook(() => useStore(), { wrapper });
      const { result: result2 } = renderHook(() => useStore(), { wrapper });

      expect(result1.current).toBe(result2.current);
    });
  });

  describe("useStore hook", () => {
    it("throws when used outside StoreProvider", () => {
      expect(() => {
        renderHook(() => useStore());
      }).toThrow("useStore must be used within StoreProvider");
    });

    it("allows store mutation through the returned instance", () => {
      const customStore = createRootStore();
      const wrapper = ({ children }: { children: ReactNode }) => (
        <StoreProvider store={customStore}>{children}</StoreProvider>
      );

      const { result } = renderHook(() => useStore(), { wrapper });

      act(() => {
        result.current.sheetStore.open();
        result.current.sheetStore.amount.applyDigit(3);
      });

      expect(customStore.sheetStore.mode).toBe("partial");
      expect(customStore.sheetStore.amount.displayText).toBe("3");
    });
  });
});
