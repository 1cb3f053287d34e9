import { render, screen } from "../../test-utils";
import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ReactNode } from "react";
import { useColorMode } from "./color-mode";

vi.mock("next-themes", () => ({
  ThemeProvider: ({ children }: { children: ReactNode }) => children,
  useTheme: vi.fn(),
}));

import { useTheme } from "next-themes";

function TestColorModeComponent() {
  const { colorMode } = useColorMode();
  return <div data-testid="color-mode">{colorMode}</div>;
}

function mockTheme(resolvedTheme: string | undefined, forcedTheme?: string) {
  vi.mocked(useTheme).mockReturnValue({
    resolvedTheme,
    forcedTheme,
    setTheme: vi.fn(),
    themes: ["light", "dark"],
  });
}

describe("useColorMode", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns light when the resolved theme is light", () => {
    mockTheme("light");
    render(<TestColorModeComponent />);
    expect(screen.getByTestId("color-mode")).toHaveTextContent("light");
  });

  it("returns dark when the resolved theme is dark", () => {
    mockTheme("dark");
    render(<TestColorModeComponent />);
    expect(screen.getByTestId("color-mode")).toHaveTextContent("dark");
  });

  it("falls back to light before the theme resolves", () => {
    mockTheme(undefined);
    render(<TestColorModeComponent />);
    expect(screen.getByTestId("color-mode")).toHaveTextContent("light");
  });

  it("prefers a forced theme", () => {
    mockTheme("light", "dark");
    render(<TestColorModeComponent />);
    expect(screen.getByTestId("color-mode")).toHaveTextContent("dark");
  });
});
