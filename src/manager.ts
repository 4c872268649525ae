import { randomUUID } from "crypto";
import fs from "fs";
import path from "path";
import {
  CUSTOM_NODES_DIRNAME,
  MANAGER_DIRNAME,
  MANAGER_SCRIPT,
  SESSION_ENV,
} from "./constants.js";
import { sessionScratchPath } from "./config.js";
import { ManagerNotInstalledError, PluginManagerError } from "./errors.js";
import { CommandRunner, runCommand } from "./exec.js";
import { Logger, silentLogger } from "./logger.js";

/**
 * Enables and disables custom nodes. BisectEngine only needs this much.
 */
export interface PluginManager {
  listEnabled(): Promise<string[]>;
  enable(names: readonly string[]): Promise<void>;
  disable(names: readonly string[]): Promise<void>;
}

export type ManagerClientOptions = {
  /** The application checkout (`<workspace>/ComfyUI`). */
  appDir: string;
  python: string;
  configDir: string;
  runner?: CommandRunner;
  logger?: Logger;
};

export const NODE_SUBCOMMANDS = [
  "show",
  "simple-show",
  "install",
  "reinstall",
  "uninstall",
  "update",
  "disable",
  "enable",
  "fix",
  "save-snapshot",
  "restore-snapshot",
  "restore-dependencies",
  "clear",
] as const;

export type NodeSubcommand = (typeof NODE_SUBCOMMANDS)[number];

export function isNodeSubcommand(value: string): value is NodeSubcommand {
  return NODE_SUBCOMMANDS.some((name) => name === value);
}

export function managerScriptPath(appDir: string): string {
  return path.join(appDir, CUSTOM_NODES_DIRNAME, MANAGER_DIRNAME, MANAGER_SCRIPT);
}

/**
 * Runs the manager's command-line script inside the workspace.
 */
export class ManagerClient implements PluginManager {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: ManagerClientOptions) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async run(args: readonly string[]): Promise<string> {
    const script = managerScriptPath(this.options.appDir);
    if (!fs.existsSync(script)) {
      throw new ManagerNotInstalledError(
        `ComfyUI-Manager not found at ${path.dirname(script)}.\n` +
          "Install it with 'comfy install --restore' or clone it into custom_nodes."
      );
    }

    this.logger.debug(`manager: ${[this.options.python, script, ...args].join(" ")}`);
    const result = await this.runner({
      command: this.options.python,
      args: [script, ...args],
      cwd: this.options.appDir,
      env: {
        COMFYUI_PATH: this.options.appDir,
        [SESSION_ENV]: sessionScratchPath(this.options.configDir, randomUUID()),
      },
      captureStdout: true,
      captureStderr: true,
    });

    if (result.exitCode !== 0) {
      const detail = (result.stderr || result.stdout).trim();
      throw new PluginManagerError(
        `ComfyUI-Manager '${args.join(" ")}' failed with exit code ${result.exitCode}` +
          (detail ? `:\n${detail}` : "")
      );
    }
    return result.stdout;
  }

  async listEnabled(): Promise<string[]> {
    return parseNodeListing(await this.run(["simple-show", "enabled"]));
  }

  async enable(names: readonly string[]): Promise<void> {
    if (names.length > 0) {
      await this.run(["enable", ...names]);
    }
  }

  async disable(names: readonly string[]): Promise<void> {
    if (names.length > 0) {
      await this.run(["disable", ...names]);
    }
  }
}

/**
 * Defers building the real manager until a node is actually touched, so
 * commands that end up not needing one do not require an installed workspace.
 */
export function lazyPluginManager(create: () => Promise<PluginManager>): PluginManager {
  let pending: Promise<PluginManager> | null = null;
  const get = () => {
    pending ??= create();
    return pending;
  };
  return {
    listEnabled: async () => (await get()).listEnabled(),
    enable: async (names) => (await get()).enable(names),
    disable: async (names) => (await get()).disable(names),
  };
}

/**
 * One node name per line; the manager prefixes progress lines with
 * "FETCH DATA".
 */
export function parseNodeListing(output: string): string[] {
  return output
    .split("\n")
    .filter((line) => !line.startsWith("FETCH DATA"))
    .map((line) => line.trim())
    .filter(Boolean);
}

export function parsePinnedNodes(value: string | undefined): Set<string> {
  return new Set(
    (value ?? "")
      .split(",")
      .map((name) => name.trim())
      .filter(Boolean)
  );
}
