import { readFile } from "node:fs/promises";
import path from "node:path";

export const CONFIG_FILE = "tuplevar.json";

// tuplevar.json, read by `tvc check` when no file is given
export interface ProjectConfig {
  /** Source file checked by default, relative to the config file. */
  entry?: string;
  warningsAsErrors?: boolean;
}

/**
 * Validate a parsed tuplevar.json. Unknown fields are ignored; a field of the
 * wrong type is an error.
 */
export function parseProjectConfig(raw: unknown): ProjectConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${CONFIG_FILE}: expected an object`);
  }

  const config: ProjectConfig = {};
  if ("entry" in raw && raw.entry !== undefined) {
    if (typeof raw.entry !== "string" || raw.entry.trim() === "") {
      throw new Error(`${CONFIG_FILE}: entry must be a non-empty string`);
    }
    config.entry = raw.entry;
  }
  if ("warningsAsErrors" in raw && raw.warningsAsErrors !== undefined) {
    if (typeof raw.warningsAsErrors !== "boolean") {
      throw new Error(`${CONFIG_FILE}: warningsAsErrors must be true or false`);
    }
    config.warningsAsErrors = raw.warningsAsErrors;
  }
  return config;
}

/**
 * Load tuplevar.json from `dir`. A missing file gives an empty config; a file
 * that is not valid JSON or fails validation throws.
 */
export async function loadProjectConfig(dir: string): Promise<ProjectConfig> {
  const configPath = path.join(dir, CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
    throw e;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new Error(`${CONFIG_FILE}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const config = parseProjectConfig(raw);
  if (config.entry) config.entry = path.resolve(dir, config.entry);
  return config;
}
