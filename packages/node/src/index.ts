import {
  type HeadlessBackend,
  type InterfaceConfig,
  type InterfaceContext,
  createInterface,
} from "@panelstack/core";
import {
  type TextBackendOptions,
  createTextBackend,
  renderFrameOutline,
} from "./backend/textBackend.js";
import {
  type EnvInterfaceSettings,
  interfaceConfigFromEnv,
  interfaceSettingsFromEnv,
} from "./config/envConfig.js";

export type { EnvInterfaceSettings, TextBackendOptions };
export { createTextBackend, interfaceConfigFromEnv, interfaceSettingsFromEnv, renderFrameOutline };

export type CreateNodeInterfaceOptions = Readonly<{
  /** Where drawn frames are written. Defaults to process.stdout. */
  output?: TextBackendOptions["output"];
  /** Defaults to process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Explicit settings; these win over the environment. */
  config?: InterfaceConfig;
  capacity?: number;
}>;

export type NodeInterface = Readonly<{
  ui: InterfaceContext;
  backend: HeadlessBackend;
}>;

export function createNodeInterface(opts: CreateNodeInterfaceOptions = {}): NodeInterface {
  const env = opts.env ?? process.env;
  const fromEnv = interfaceSettingsFromEnv(env);
  const capacity = opts.capacity ?? fromEnv.capacity;
  const backend = createTextBackend({
    output: opts.output ?? process.stdout,
    ...(capacity === undefined ? {} : { capacity }),
  });
  const ui = createInterface(backend, { ...fromEnv.config, ...opts.config });
  return Object.freeze({ ui, backend });
}
