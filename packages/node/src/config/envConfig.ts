import type { InterfaceConfig } from "@panelstack/core";

type EnvMap = Readonly<Record<string, string | undefined>>;

/** Settings a Node host can take from the environment. */
export type EnvInterfaceSettings = Readonly<{
  config: InterfaceConfig;
  /** Headless backend item capacity. */
  capacity: number | undefined;
}>;

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: EnvMap, key: string, min: number): number | undefined {
  const raw = envText(env, key);
  if (!raw || !/^\d+$/u.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < min) return undefined;
  return value;
}

function envBool(env: EnvMap, key: string): boolean | undefined {
  const raw = envText(env, key)?.toLowerCase();
  if (!raw) return undefined;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return undefined;
}

/**
 * Read PANELSTACK_* variables. Unset or unparsable values are left out so
 * the defaults apply.
 */
export function interfaceSettingsFromEnv(env: EnvMap): EnvInterfaceSettings {
  const config: {
    labelWidth?: number;
    font?: string;
    fontSize?: number;
    logDiagnostics?: boolean;
  } = {};

  const labelWidth = envInt(env, "PANELSTACK_LABEL_WIDTH", 0);
  if (labelWidth !== undefined) config.labelWidth = labelWidth;
  const font = envText(env, "PANELSTACK_FONT");
  if (font !== undefined) config.font = font;
  const fontSize = envInt(env, "PANELSTACK_FONT_SIZE", 1);
  if (fontSize !== undefined) config.fontSize = fontSize;
  const logDiagnostics = envBool(env, "PANELSTACK_DIAGNOSTICS");
  if (logDiagnostics !== undefined) config.logDiagnostics = logDiagnostics;

  return Object.freeze({
    config: Object.freeze(config),
    capacity: envInt(env, "PANELSTACK_CAPACITY", 1),
  });
}

export function interfaceConfigFromEnv(env: EnvMap): InterfaceConfig {
  return interfaceSettingsFromEnv(env).config;
}
