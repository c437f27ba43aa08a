import type { DiagnosticListener } from "./diagnostics/types.js";
import { invalidProps } from "./errors.js";

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEFAULT_LABEL_WIDTH = 60;

/** User-facing interface configuration; every field is optional. */
export type InterfaceConfig = Readonly<{
  /** Width in pixels of the label column used by labeled widgets. */
  labelWidth?: number;
  font?: string | null;
  fontSize?: number | null;
  /** Write diagnostics through console.warn. Defaults to off in production. */
  logDiagnostics?: boolean;
  onDiagnostic?: DiagnosticListener;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedInterfaceConfig = Readonly<{
  labelWidth: number;
  font: string | null;
  fontSize: number | null;
  logDiagnostics: boolean;
  onDiagnostic: DiagnosticListener | undefined;
}>;

const DEFAULT_CONFIG: ResolvedInterfaceConfig = Object.freeze({
  labelWidth: DEFAULT_LABEL_WIDTH,
  font: null,
  fontSize: null,
  logDiagnostics: NODE_ENV !== "production",
  onDiagnostic: undefined,
});

export function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

export function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

export function requireFontName(v: string): string {
  if (v.trim().length === 0) invalidProps("font must be a non-empty string");
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveInterfaceConfig(config: InterfaceConfig | undefined): ResolvedInterfaceConfig {
  if (!config) return DEFAULT_CONFIG;
  const labelWidth =
    config.labelWidth === undefined
      ? DEFAULT_CONFIG.labelWidth
      : requireNonNegativeInt("labelWidth", config.labelWidth);
  const font =
    config.font === undefined || config.font === null ? null : requireFontName(config.font);
  const fontSize =
    config.fontSize === undefined || config.fontSize === null
      ? null
      : requirePositiveInt("fontSize", config.fontSize);
  const logDiagnostics =
    config.logDiagnostics === undefined
      ? DEFAULT_CONFIG.logDiagnostics
      : config.logDiagnostics === true;
  const onDiagnostic = typeof config.onDiagnostic === "function" ? config.onDiagnostic : undefined;

  return Object.freeze({ labelWidth, font, fontSize, logDiagnostics, onDiagnostic });
}
