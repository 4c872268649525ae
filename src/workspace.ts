import fs from "fs";
import os from "os";
import path from "path";
import { ConfigStore, currentPlatform } from "./config.js";
import {
  COMFY_DIRNAME,
  COMFY_ORIGIN_URLS,
  CUSTOM_NODES_DIRNAME,
} from "./constants.js";
import {
  ConflictingDirectivesError,
  errorMessage,
  InvalidExplicitPathError,
  NoWorkspaceFoundError,
} from "./errors.js";
import { Logger, silentLogger } from "./logger.js";
import {
  CheckoutInfo,
  CheckoutProbe,
  Platform,
  ResolvedWorkspace,
  WorkspaceDirectives,
} from "./types.js";
import { ensureDir, isDirectory, resolveUserPath } from "./utils.js";

export type ResolveContext = {
  config: ConfigStore;
  cwd: string;
  probe: CheckoutProbe;
  platform?: Platform;
  homeDir?: string;
  logger?: Logger;
  /**
   * "install" accepts explicit and --here targets that hold no installation
   * yet, since the install command is what creates one.
   */
  purpose?: "operate" | "install";
};

export function appDir(workspacePath: string): string {
  return path.join(workspacePath, COMFY_DIRNAME);
}

export function hasInstallMarker(dirPath: string): boolean {
  return isDirectory(appDir(dirPath));
}

export function isComfyCheckout(info: CheckoutInfo): boolean {
  return info.remoteUrls.some((url) => COMFY_ORIGIN_URLS.has(url));
}

/**
 * If `dirPath` lies inside a checkout of the application, returns the
 * workspace holding it (the checkout's parent). A custom node's own
 * repository is looked through to the checkout above `custom_nodes`.
 */
export async function findCheckoutWorkspace(
  dirPath: string,
  probe: CheckoutProbe
): Promise<string | null> {
  const info = await probe.inspect(dirPath);
  if (info && isComfyCheckout(info)) {
    return path.dirname(info.root);
  }

  const segments = path.resolve(dirPath).split(path.sep);
  const index = segments.indexOf(CUSTOM_NODES_DIRNAME);
  if (index <= 0) {
    return null;
  }
  const outer = segments.slice(0, index).join(path.sep) || path.sep;
  const outerInfo = await probe.inspect(outer);
  if (outerInfo && isComfyCheckout(outerInfo)) {
    return path.dirname(outerInfo.root);
  }
  return null;
}

/**
 * Returns the workspace `dirPath` denotes: itself when it holds the
 * marker, the parent when it is a checkout, otherwise null.
 */
export async function classifyDirectory(
  dirPath: string,
  probe: CheckoutProbe
): Promise<string | null> {
  if (hasInstallMarker(dirPath)) {
    return dirPath;
  }
  return findCheckoutWorkspace(dirPath, probe);
}

export function fallbackWorkspacePath(
  platform: Platform = currentPlatform(),
  homeDir: string = os.homedir()
): string {
  if (platform === "linux") {
    return path.join(homeDir, "comfy");
  }
  return path.join(homeDir, "Documents", "comfy");
}

/**
 * Picks the one workspace this invocation operates on.
 *
 * Directives (--workspace, --recent, --here) are exclusive and never fall
 * back to another source. Without a directive the chain is: user default,
 * current directory, checkout containing the current directory, recent
 * workspace, then the per-platform fallback directory (created if needed).
 */
export async function resolveWorkspace(
  directives: WorkspaceDirectives,
  context: ResolveContext
): Promise<ResolvedWorkspace> {
  const given = activeDirectives(directives);
  if (given.length > 1) {
    throw new ConflictingDirectivesError(given);
  }

  const logger = context.logger ?? silentLogger;
  const homeDir = context.homeDir ?? os.homedir();
  const installing = context.purpose === "install";

  if (directives.workspace !== undefined) {
    const target = resolveUserPath(directives.workspace, context.cwd, homeDir);
    if (installing) {
      return { path: target, kind: "specified" };
    }
    if (!fs.existsSync(target)) {
      throw new InvalidExplicitPathError(`Workspace path not found: ${target}`);
    }
    if (!hasInstallMarker(target)) {
      throw new InvalidExplicitPathError(
        `Specified path is not a ComfyUI workspace: ${target} (expected ${appDir(target)})`
      );
    }
    return { path: target, kind: "specified" };
  }

  if (directives.recent) {
    const recent = context.config.get("recent_workspace_path");
    if (!recent) {
      throw new InvalidExplicitPathError("No recent workspace has been set.");
    }
    if (!hasInstallMarker(recent)) {
      throw new InvalidExplicitPathError(
        `The recent workspace ${recent} is not a valid ComfyUI workspace.`
      );
    }
    return { path: recent, kind: "recent" };
  }

  if (directives.here) {
    const here = await classifyDirectory(context.cwd, context.probe);
    if (here) {
      return { path: here, kind: "current_dir" };
    }
    if (installing) {
      return { path: context.cwd, kind: "current_dir" };
    }
    throw new InvalidExplicitPathError(
      `Current directory is not a ComfyUI workspace or checkout: ${context.cwd}`
    );
  }

  const defaultPath = context.config.get("default_workspace_path");
  if (defaultPath) {
    if (hasInstallMarker(defaultPath)) {
      return { path: defaultPath, kind: "default" };
    }
    logger.warn(`The default workspace ${defaultPath} is not a valid ComfyUI workspace.`);
  }

  if (hasInstallMarker(context.cwd)) {
    return { path: context.cwd, kind: "current_dir" };
  }

  const checkoutWorkspace = await findCheckoutWorkspace(context.cwd, context.probe);
  if (checkoutWorkspace) {
    return { path: checkoutWorkspace, kind: "current_dir" };
  }

  const recent = context.config.get("recent_workspace_path");
  if (recent) {
    if (hasInstallMarker(recent)) {
      return { path: recent, kind: "recent" };
    }
    logger.warn(`The recent workspace ${recent} is not a valid ComfyUI workspace.`);
  }

  const fallback = fallbackWorkspacePath(context.platform ?? currentPlatform(), homeDir);
  try {
    ensureDir(fallback);
  } catch (error) {
    throw new NoWorkspaceFoundError(
      `No ComfyUI workspace found and the fallback ${fallback} could not be created: ${errorMessage(error)}`
    );
  }
  return { path: fallback, kind: "fallback" };
}

/**
 * Fails unless the resolved workspace actually holds an installation.
 */
export function requireInstalled(workspace: ResolvedWorkspace): string {
  if (!hasInstallMarker(workspace.path)) {
    throw new NoWorkspaceFoundError(
      `ComfyUI is not installed at ${workspace.path}.\n` +
        "Install it with 'comfy install', run from a ComfyUI workspace, or pass --workspace."
    );
  }
  return workspace.path;
}

export function recordRecentWorkspace(config: ConfigStore, workspacePath: string): void {
  config.set("recent_workspace_path", path.resolve(workspacePath));
}

function activeDirectives(directives: WorkspaceDirectives): string[] {
  const given: string[] = [];
  if (directives.workspace !== undefined) {
    given.push("workspace");
  }
  if (directives.recent) {
    given.push("recent");
  }
  if (directives.here) {
    given.push("here");
  }
  return given;
}
