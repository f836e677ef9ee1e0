/**
 * Configuration loading.
 *
 * Settings come from, in increasing priority: built-in defaults, an optional
 * bloggy.toml, the BLOGGY_NOTES_DIR environment variable, and CLI flags.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as toml from "toml";
import { BloggyConfig, DEFAULT_CONFIG } from "./models.js";
import { ConfigError, errorMessage } from "./errors.js";

/** Config file looked up in the working directory */
export const CONFIG_FILE = "bloggy.toml";

/** Environment variable overriding the notes root */
export const NOTES_DIR_ENV = "BLOGGY_NOTES_DIR";

/** TOML keys and the settings they map to */
const CONFIG_KEYS = {
  notes_dir: "notesDir",
  posts_assets_dir: "postsAssetsDir",
  now_dir: "nowDir",
  asset_dir_name: "assetDirName",
} as const satisfies Record<string, keyof BloggyConfig>;

type PathSetting = Exclude<keyof BloggyConfig, "assetDirName">;

/**
 * Read settings from a TOML file. Relative paths in the file are resolved
 * against the file's own directory.
 */
export function loadConfigFile(configPath: string): Partial<BloggyConfig> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read config ${configPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid TOML in ${configPath}: ${errorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new ConfigError(`Invalid config ${configPath}: expected a table`);
  }

  const table = new Map<string, unknown>(Object.entries(parsed));
  const baseDir = path.dirname(path.resolve(configPath));
  const settings: Partial<BloggyConfig> = {};

  for (const [key, setting] of Object.entries(CONFIG_KEYS)) {
    const value = table.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string" || value === "") {
      throw new ConfigError(
        `Invalid config ${configPath}: ${key} must be a non-empty string`,
      );
    }
    settings[setting] =
      setting === "assetDirName" ? value : path.resolve(baseDir, value);
  }

  return settings;
}

export interface ResolveConfigOptions {
  /** --notes-dir flag */
  notesDir?: string;
  /** --config flag; when set the file must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Build the effective configuration with absolute paths.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): BloggyConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fileSettings: Partial<BloggyConfig> = {};
  if (options.configPath) {
    fileSettings = loadConfigFile(path.resolve(cwd, options.configPath));
  } else {
    const defaultPath = path.join(cwd, CONFIG_FILE);
    if (fs.existsSync(defaultPath)) {
      fileSettings = loadConfigFile(defaultPath);
    }
  }

  const config: BloggyConfig = { ...DEFAULT_CONFIG, ...fileSettings };

  const envNotesDir = env[NOTES_DIR_ENV];
  if (envNotesDir) config.notesDir = envNotesDir;
  if (options.notesDir) config.notesDir = options.notesDir;

  const pathSettings: PathSetting[] = ["notesDir", "postsAssetsDir", "nowDir"];
  for (const setting of pathSettings) {
    config[setting] = path.resolve(cwd, config[setting]);
  }

  return config;
}
