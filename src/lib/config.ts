import { snappy, type SpringTiming } from "./motion";

export interface AppConfig {
  currencySymbol: string;
  /** Spring behind the trigger/sheet swap. */
  sheetSpring: SpringTiming;
}

export interface ConfigEnv {
  VITE_CURRENCY_SYMBOL?: string;
  VITE_SPRING_DURATION?: string;
  VITE_SPRING_EXTRA_BOUNCE?: string;
}

const DEFAULT_SPRING_DURATION = 0.35;
const DEFAULT_SPRING_EXTRA_BOUNCE = 0.1;

export const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
  currencySymbol: "$",
  sheetSpring: snappy(DEFAULT_SPRING_DURATION, DEFAULT_SPRING_EXTRA_BOUNCE),
});

function readNumber(
  env: ConfigEnv,
  key: "VITE_SPRING_DURATION" | "VITE_SPRING_EXTRA_BOUNCE",
  fallback: number,
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`Ignoring ${key}="${raw}": not a number`);
    return fallback;
  }
  return value;
}

export function loadAppConfig(env: ConfigEnv): Readonly<AppConfig> {
  const currencySymbol =
    env.VITE_CURRENCY_SYMBOL?.trim() || DEFAULT_CONFIG.currencySymbol;

  const duration = readNumber(
    env,
    "VITE_SPRING_DURATION",
    DEFAULT_SPRING_DURATION,
  );
  const extraBounce = readNumber(
    env,
    "VITE_SPRING_EXTRA_BOUNCE",
    DEFAULT_SPRING_EXTRA_BOUNCE,
  );

  let sheetSpring = DEFAULT_CONFIG.sheetSpring;
  try {
    sheetSpring = snappy(duration, extraBounce);
  } catch (error) {
    console.error("Invalid sheet spring, using default:", error);
  }

  return Object.freeze({ currencySymbol, sheetSpring });
}

export const appConfig = loadAppConfig(import.meta.env);
