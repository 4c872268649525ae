import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { CONFIG_DIR_ENV, CONFIG_FILENAME, PYTHON_ENV } from "./constants.js";
import { ConfigError } from "./errors.js";
import { Platform } from "./types.js";
import { ensureDir, safeJsonParse, writeText } from "./utils.js";

export const ConfigSchema = z.object({
  default_workspace_path: z.string().optional(),
  recent_workspace_path: z.string().optional(),
  default_launch_extras: z.string().optional(),
  python: z.string().optional(),
  civitai_api_token: z.string().optional(),
  background: z
    .object({
      listen: z.string(),
      port: z.number().int().positive(),
      pid: z.number().int().positive(),
    })
    .optional(),
});

export type ConfigValues = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof ConfigValues;

/**
 * Key-value settings that survive across invocations.
 */
export interface ConfigStore {
  readonly filePath: string | null;
  get<K extends ConfigKey>(key: K): ConfigValues[K];
  set<K extends ConfigKey>(key: K, value: NonNullable<ConfigValues[K]>): void;
  delete(key: ConfigKey): void;
}

export function configDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: Platform = currentPlatform(),
  homeDir: string = os.homedir()
): string {
  const override = env[CONFIG_DIR_ENV];
  if (override) {
    return path.resolve(override);
  }
  if (platform === "win32") {
    return path.join(env.APPDATA ?? path.join(homeDir, "AppData", "Roaming"), "comfy-cli");
  }
  if (platform === "darwin") {
    return path.join(homeDir, "Library", "Application Support", "comfy-cli");
  }
  return path.join(env.XDG_CONFIG_HOME ?? path.join(homeDir, ".config"), "comfy-cli");
}

export function currentPlatform(): Platform {
  const platform = process.platform;
  return platform === "win32" || platform === "darwin" ? platform : "linux";
}

export class FileConfigStore implements ConfigStore {
  readonly filePath: string;
  private values: ConfigValues;

  constructor(dir: string) {
    this.filePath = path.join(dir, CONFIG_FILENAME);
    this.values = loadConfigFile(this.filePath);
  }

  get<K extends ConfigKey>(key: K): ConfigValues[K] {
    return this.values[key];
  }

  set<K extends ConfigKey>(key: K, value: NonNullable<ConfigValues[K]>): void {
    const next: ConfigValues = { ...this.values };
    next[key] = value;
    this.values = next;
    this.write();
  }

  delete(key: ConfigKey): void {
    if (!(key in this.values)) {
      return;
    }
    const next: ConfigValues = { ...this.values };
    delete next[key];
    this.values = next;
    this.write();
  }

  private write(): void {
    writeText(this.filePath, `${JSON.stringify(this.values, null, 2)}\n`);
  }
}

export class MemoryConfigStore implements ConfigStore {
  readonly filePath = null;
  private values: ConfigValues;

  constructor(initial: ConfigValues = {}) {
    this.values = { ...initial };
  }

  get<K extends ConfigKey>(key: K): ConfigValues[K] {
    return this.values[key];
  }

  set<K extends ConfigKey>(key: K, value: NonNullable<ConfigValues[K]>): void {
    const next: ConfigValues = { ...this.values };
    next[key] = value;
    this.values = next;
  }

  delete(key: ConfigKey): void {
    const next: ConfigValues = { ...this.values };
    delete next[key];
    this.values = next;
  }

  snapshot(): ConfigValues {
    return { ...this.values };
  }
}

export function loadConfigFile(filePath: string): ConfigValues {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const raw = fs.readFileSync(filePath, "utf8");
  if (!raw.trim()) {
    return {};
  }
  const parsed = ConfigSchema.safeParse(safeJsonParse(raw));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config at ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

/**
 * Scratch directory for one launch or manager invocation.
 */
export function sessionScratchPath(dir: string, id: string): string {
  const tmpDir = path.join(dir, "tmp");
  ensureDir(tmpDir);
  return path.join(tmpDir, id);
}

export function pythonExecutable(
  config: ConfigStore,
  env: NodeJS.ProcessEnv = process.env,
  platform: Platform = currentPlatform()
): string {
  return env[PYTHON_ENV] || config.get("python") || (platform === "win32" ? "python" : "python3");
}
