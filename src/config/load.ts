import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";
import { DEFAULT_CONFIG, validateAndNormalizeConfig } from "./schema.js";

export const DEFAULT_CONFIG_PATH = ".a11y-score.yml";

export function loadConfig(configPath?: string): { config: AppConfig; source: string } {
  const resolved = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return { config: DEFAULT_CONFIG, source: "defaults" };
  }

  const raw = readFileSync(resolved, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Could not parse ${resolved}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const config = validateAndNormalizeConfig(parsed);

  return { config, source: resolved };
}
