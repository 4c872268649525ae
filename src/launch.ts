import { ChildProcess, spawn } from "child_process";
import { randomUUID } from "crypto";
import fs from "fs";
import { ConfigStore, sessionScratchPath } from "./config.js";
import {
  DEFAULT_LISTEN,
  DEFAULT_PORT,
  READY_MARKER,
  SESSION_ENV,
} from "./constants.js";
import { CliError, CommandFailedError } from "./errors.js";
import { CommandRunner, runCommand } from "./exec.js";
import { Logger, silentLogger } from "./logger.js";
import { BackgroundRun, WorkspaceKind } from "./types.js";
import { readText, splitExtras, truncateText } from "./utils.js";

export type LaunchOptions = {
  appDir: string;
  python: string;
  configDir: string;
  extra: string[];
  runner?: CommandRunner;
  logger?: Logger;
};

/**
 * Runs the application attached to this terminal until it exits. The
 * application asks for a restart by creating `<session>.reboot`.
 */
export async function launchForeground(options: LaunchOptions): Promise<number> {
  const runner = options.runner ?? runCommand;
  const logger = options.logger ?? silentLogger;
  const session = sessionScratchPath(options.configDir, randomUUID());
  const rebootPath = `${session}.reboot`;

  // Ctrl-C reaches the child through the terminal; stay alive to collect its exit code.
  const onInterrupt = () => logger.info("Interrupted, waiting for ComfyUI to exit.");
  process.on("SIGINT", onInterrupt);
  try {
    for (;;) {
      const result = await runner({
        command: options.python,
        args: ["main.py", ...options.extra],
        cwd: options.appDir,
        env: {
          [SESSION_ENV]: session,
          PYTHONIOENCODING: "utf-8",
        },
        inheritStdio: true,
      });
      if (!fs.existsSync(rebootPath)) {
        return result.exitCode;
      }
      fs.rmSync(rebootPath, { force: true });
      logger.info("Restarting ComfyUI.");
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

/**
 * Extra launch arguments: the ones given, or the user's saved defaults
 * when launching the default workspace without any.
 */
export function resolveLaunchExtras(
  extra: string[],
  kind: WorkspaceKind,
  config: ConfigStore
): string[] {
  if (extra.length > 0 || kind !== "default") {
    return extra;
  }
  return splitExtras(config.get("default_launch_extras"));
}

export function parseListenPort(extra: string[]): { listen: string; port: number } {
  let listen = DEFAULT_LISTEN;
  let port = DEFAULT_PORT;
  for (let i = 0; i < extra.length - 1; i += 1) {
    if (extra[i] === "--port") {
      const parsed = Number.parseInt(extra[i + 1], 10);
      if (Number.isInteger(parsed) && parsed > 0) {
        port = parsed;
      }
    } else if (extra[i] === "--listen") {
      listen = extra[i + 1];
    }
  }
  return { listen, port };
}

export async function isServerRunning(host: string, port: number): Promise<boolean> {
  try {
    const response = await fetch(`http://${host}:${port}/history`, {
      signal: AbortSignal.timeout(2000),
    });
    return response.status === 200;
  } catch {
    return false;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === "EPERM";
  }
}

/**
 * The recorded background run, dropping the record if its process is gone.
 */
export function liveBackground(config: ConfigStore): BackgroundRun | null {
  const background = config.get("background");
  if (!background) {
    return null;
  }
  if (!isProcessAlive(background.pid)) {
    config.delete("background");
    return null;
  }
  return background;
}

export type BackgroundOptions = LaunchOptions & {
  config: ConfigStore;
  pollIntervalMs?: number;
  probeServer?: (host: string, port: number) => Promise<boolean>;
};

/**
 * Starts the application detached from this process and waits until it
 * reports that the server is up. Output goes to a log file so the child
 * keeps running after this process exits.
 */
export async function launchBackground(options: BackgroundOptions): Promise<BackgroundRun> {
  const logger = options.logger ?? silentLogger;
  const existing = liveBackground(options.config);
  if (existing) {
    throw new CliError(
      "ComfyUI is already running in background.\nYou cannot start more than one background service."
    );
  }

  const { listen, port } = parseListenPort(options.extra);
  const probeServer = options.probeServer ?? isServerRunning;
  if (await probeServer(listen, port)) {
    throw new CliError(
      `The ${port} port is already in use. A new ComfyUI server cannot be launched.`
    );
  }

  const session = sessionScratchPath(options.configDir, randomUUID());
  const logPath = `${session}.log`;
  const logFd = fs.openSync(logPath, "a");
  const child = spawn(options.python, ["main.py", ...options.extra], {
    cwd: options.appDir,
    env: {
      ...process.env,
      [SESSION_ENV]: session,
      PYTHONIOENCODING: "utf-8",
    },
    detached: true,
    stdio: ["ignore", logFd, logFd],
  });
  fs.closeSync(logFd);
  logger.debug(`background log: ${logPath}`);

  await waitForReady(child, logPath, options.pollIntervalMs ?? 250);

  const pid = child.pid;
  if (pid === undefined) {
    throw new CommandFailedError("Failed to start ComfyUI in the background.");
  }
  child.unref();
  const run: BackgroundRun = { listen, port, pid };
  options.config.set("background", run);
  return run;
}

function waitForReady(
  child: ChildProcess,
  logPath: string,
  pollIntervalMs: number
): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const finish = (error?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearInterval(timer);
      child.off("exit", onExit);
      child.off("error", onError);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const check = () => {
      if ((readText(logPath) ?? "").includes(READY_MARKER)) {
        finish();
      }
    };

    const onExit = (code: number | null) => {
      const log = truncateText((readText(logPath) ?? "").trim(), 4000);
      finish(
        new CommandFailedError(
          `Execution error: failed to launch ComfyUI (exit code ${code ?? "unknown"}).` +
            (log ? `\n\nError log during ComfyUI execution:\n${log}` : "")
        )
      );
    };

    const onError = (error: Error) => finish(error);

    const timer = setInterval(check, pollIntervalMs);
    child.on("exit", onExit);
    child.on("error", onError);
  });
}

/**
 * Stops the recorded background run and forgets it.
 */
export function stopBackground(
  config: ConfigStore,
  kill: (pid: number) => boolean = killProcessGroup
): BackgroundRun {
  const background = config.get("background");
  if (!background) {
    throw new CliError("No ComfyUI is running in the background.");
  }
  const killed = kill(background.pid);
  config.delete("background");
  if (!killed) {
    throw new CliError(
      `Failed to stop ComfyUI in the background (pid=${background.pid}).`
    );
  }
  return background;
}

export function killProcessGroup(pid: number): boolean {
  try {
    // Background runs are spawned detached, so they lead their own group.
    process.kill(process.platform === "win32" ? pid : -pid, "SIGTERM");
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ESRCH") {
      return true;
    }
    try {
      process.kill(pid, "SIGTERM");
      return true;
    } catch {
      return false;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function formatBackground(run: BackgroundRun): string {
  return `http://${run.listen}:${run.port} (pid=${run.pid})`;
}
