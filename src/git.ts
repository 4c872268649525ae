import path from "path";
import { CommandFailedError } from "./errors.js";
import { CommandRunner, RunResult, runChecked, runCommand } from "./exec.js";
import { CheckoutInfo, CheckoutProbe } from "./types.js";
import { ensureDir, isDirectory } from "./utils.js";

export class GitCheckoutProbe implements CheckoutProbe {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  async inspect(dirPath: string): Promise<CheckoutInfo | null> {
    if (!isDirectory(dirPath)) {
      return null;
    }
    let toplevel: RunResult;
    try {
      toplevel = await this.runner({
        command: "git",
        args: ["-C", dirPath, "rev-parse", "--show-toplevel"],
        cwd: dirPath,
        captureStdout: true,
        captureStderr: true,
      });
    } catch {
      // git itself is unavailable
      return null;
    }
    if (toplevel.exitCode !== 0 || !toplevel.stdout.trim()) {
      return null;
    }

    const remotes = await this.runner({
      command: "git",
      args: ["-C", dirPath, "remote", "-v"],
      cwd: dirPath,
      captureStdout: true,
      captureStderr: true,
    });
    if (remotes.exitCode !== 0) {
      throw new CommandFailedError(`git remote -v failed in ${dirPath}: ${remotes.stderr.trim()}`);
    }

    return {
      root: path.resolve(toplevel.stdout.trim()),
      remoteUrls: parseRemoteUrls(remotes.stdout),
    };
  }
}

/**
 * Extracts the distinct URLs from `git remote -v` output, e.g.
 * `origin  https://example.com/repo.git (fetch)`.
 */
export function parseRemoteUrls(output: string): string[] {
  const urls: string[] = [];
  for (const line of output.split("\n")) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 2) {
      continue;
    }
    const url = parts[1];
    if (!urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}

export async function gitClone(
  url: string,
  destDir: string,
  runner: CommandRunner = runCommand
): Promise<void> {
  ensureDir(path.dirname(destDir));
  await runChecked(
    {
      command: "git",
      args: ["clone", url, destDir],
      cwd: path.dirname(destDir),
      inheritStdio: true,
    },
    runner
  );
}

export async function gitCheckout(
  repoDir: string,
  ref: string,
  runner: CommandRunner = runCommand
): Promise<void> {
  await runChecked(
    {
      command: "git",
      args: ["-C", repoDir, "checkout", ref],
      cwd: repoDir,
      captureStdout: true,
      captureStderr: true,
    },
    runner
  );
}

export async function gitPull(
  repoDir: string,
  runner: CommandRunner = runCommand
): Promise<void> {
  await runChecked(
    {
      command: "git",
      args: ["-C", repoDir, "pull"],
      cwd: repoDir,
      inheritStdio: true,
    },
    runner
  );
}
