/**
 * dtoshape init command
 */

import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { DtoshapeConfig, Result } from "../types.js";
import {
  CONFIG_FILE_NAME,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_SELECTOR_NAMES,
} from "../config.js";

type InitOptions = {
  readonly force?: boolean;
};

export const DEFAULT_CONFIG: DtoshapeConfig = {
  include: ["src/index.ts"],
  outputFile: DEFAULT_OUTPUT_FILE,
  selectorNames: DEFAULT_SELECTOR_NAMES,
  nullHandling: "guard",
  commentOutput: "all",
};

/**
 * Write a default dtoshape.json into `cwd`
 */
export const initProject = (
  cwd: string,
  options: InitOptions = {}
): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(configPath) && !options.force) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME} already exists (use --force to overwrite)`,
    };
  }

  writeFileSync(configPath, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`, "utf-8");
  return { ok: true, value: configPath };
};
