import { getConfigFromCli } from "./arg-parser.js";
import type { OvercallConfig } from "./types.js";

export type { OvercallConfig } from "./types.js";

let config: OvercallConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
