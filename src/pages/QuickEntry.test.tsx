import { render, screen, fireEvent } from "../test-utils";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import QuickEntry from "./QuickEntry";
import { createRootStore } from "../store/RootStore";
import type { IRootStore } from "../store/RootStore";
import { toaster } from "../components/ui/toaster";

vi.mock("../components/ui/toaster", () => ({
  toaster: { create: vi.fn() },
  Toaster: () => null,
}));

describe("QuickEntry", () => {
  let store: IRootStore;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2026, 9, 18, 12));
    vi.spyOn(console, "info").mockImplementation(() => {});
    store = createRootStore();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("starts with only the trigger", () => {
    render(<QuickEntry />, { store });
    expect(
      screen.getByRole("button", { name: "New transaction" }),
    ).toBeInTheDocument();
    expect(screen.queryByRole("button", { name: "Close" })).toBeNull();
  });

  it("opens the sheet from the trigger", async () => {
    render(<QuickEntry />, { store });
    fireEvent.click(screen.getByRole("button", { name: "New transaction" }));

    expect(
      await screen.findByRole("button", { name: "Close" }),
    ).toBeInTheDocument();
    expect(store.sheetStore.mode).toBe("partial");
    expect(screen.getByTestId("amount")).toHaveTextContent("$0");
  });

  it("announces an added draft and collapses", async () => {
    render(<QuickEntry />, { store });
    fireEvent.click(screen.getByRole("button", { name: "New transaction" }));
    fireEvent.click(await screen.findByRole("button", { name: "7" }));
    fireEvent.click(screen.getByRole("button", { name: "Add" }));

    expect(toaster.create).toHaveBeenCalledWith({
      type: "success",
      title: "Added $7",
      description: "Income · Oct 18, 2026",
    });
    expect(console.info).toHaveBeenCalledWith("Transaction draft:", {
      amount: 7,
      amountText: "7",
      name: "",
      type: "income",
      category: "none",
      date: "2026-10-18",
    });
    expect(store.sheetStore.mode).toBe("collapsed");
    expect(
      await screen.findByRole("button", { name: "New transaction" }),
    ).toBeInTheDocument();
  });

  it("titles the toast with the amount as entered", async () => {
    render(<QuickEntry />, { store });
    fireEvent.click(screen.getByRole("button", { name: "New transaction" }));
    fireEvent.click(await screen.findByRole("button", { name: "0" }));
    for (const name of ["Decimal point", "5", "0"]) {
      fireEvent.click(screen.getByRole("button", { name }));
    }
    fireEvent.click(screen.getByRole("button", { name: "Add" }));

    expect(toaster.create).toHaveBeenCalledWith({
      type: "success",
      title: "Added $0.50",
      description: "Income · Oct 18, 2026",
    });
  });

  it("close returns to the trigger", async () => {
    render(<QuickEntry />, { store });
    fireEvent.click(screen.getByRole("button", { name: "New transaction" }));
    fireEvent.click(await screen.findByRole("button", { name: "Close" }));

    expect(store.sheetStore.mode).toBe("collapsed");
    expect(toaster.create).not.toHaveBeenCalled();
    expect(
      await screen.findByRole("button", { name: "New transaction" }),
    ).toBeInTheDocument();
  });
});
