import type { SystemStyleObject } from "@chakra-ui/react";
import type { ColorMode } from "../ui/color-mode";

export const SHEET_CORNER_RADIUS = "32px";
const SHEET_SHADOW_OPACITY = 0.24;

export interface SheetSurfaceOptions {
  colorMode: ColorMode;
  fullScreen: boolean;
}

/**
 * Background, border and shadow of the floating sheet. Dark mode trades the
 * drop shadow for a lifted background; full screen drops border and shadow.
 */
export function sheetSurfaceStyles({
  colorMode,
  fullScreen,
}: SheetSurfaceOptions): SystemStyleObject {
  const dark = colorMode === "dark";
  const shadowOpacity = fullScreen ? 0 : SHEET_SHADOW_OPACITY;
  return {
    bg: dark ? "bg.muted" : "bg",
    borderRadius: SHEET_CORNER_RADIUS,
    borderWidth: "1px",
    borderColor: fullScreen ? "transparent" : "border.muted",
    boxShadow: dark ? "none" : `0 0 10px rgba(128, 128, 128, ${shadowOpacity})`,
  };
}

/** Outer padding around the sheet; full screen runs edge to edge. */
export function sheetInset(fullScreen: boolean): string {
  return fullScreen ? "0" : "4";
}

export const detailRowStyles: SystemStyleObject = {
  color: "fg",
  px: "10px",
  py: "8px",
  h: "50px",
  bg: "bg.muted",
  borderRadius: "12px",
};

export function keypadKeyStyles(scaleWithPress = true): SystemStyleObject {
  return {
    color: "fg",
    bg: "transparent",
    borderRadius: "8px",
    transition: "transform 0.15s, background 0.15s",
    _active: {
      bg: "bg.muted",
      transform: scaleWithPress ? "scale(1.1)" : "none",
    },
  };
}
