import { ThemeProvider, useTheme, type ThemeProviderProps } from "next-themes";

export type ColorMode = "light" | "dark";

export function ColorModeProvider(props: ThemeProviderProps) {
  return (
    <ThemeProvider
      attribute="class"
      defaultTheme="system"
      enableSystem
      disableTransitionOnChange
      {...props}
    />
  );
}

/** Follows the system scheme unless a theme is forced. */
export function useColorMode(): { colorMode: ColorMode } {
  const { resolvedTheme, forcedTheme } = useTheme();
  const colorMode: ColorMode =
    (forcedTheme ?? resolvedTheme) === "dark" ? "dark" : "light";
  return { colorMode };
}
