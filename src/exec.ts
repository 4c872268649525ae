import { spawn } from "child_process";
import { CommandFailedError } from "./errors.js";

export type RunOptions = {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
  stdin?: string;
  /** Hand the child this process's terminal instead of piping. */
  inheritStdio?: boolean;
  captureStdout?: boolean;
  captureStderr?: boolean;
  timeoutMs?: number;
};

export type RunResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut?: boolean;
};

export type CommandRunner = (options: RunOptions) => Promise<RunResult>;

export function runCommand(options: RunOptions): Promise<RunResult> {
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  return new Promise((resolve, reject) => {
    let timeoutId: NodeJS.Timeout | undefined;
    let timedOut = false;
    const child = spawn(options.command, options.args, {
      cwd: options.cwd,
      env: {
        ...process.env,
        ...options.env,
      },
      stdio: options.inheritStdio ? "inherit" : ["pipe", "pipe", "pipe"],
    });

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);
    }

    child.stdout?.on("data", (chunk: Buffer) => {
      if (options.captureStdout) {
        stdoutChunks.push(chunk);
      }
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      if (options.captureStderr) {
        stderrChunks.push(chunk);
      }
    });

    child.on("error", (error) => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      reject(error);
    });

    child.on("close", (code) => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      resolve({
        exitCode: code ?? (timedOut ? 124 : 1),
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
        timedOut,
      });
    });

    if (child.stdin) {
      if (options.stdin) {
        child.stdin.write(options.stdin);
      }
      child.stdin.end();
    }
  });
}

/**
 * Runs a command and throws CommandFailedError on a non-zero exit.
 */
export async function runChecked(
  options: RunOptions,
  runner: CommandRunner = runCommand
): Promise<RunResult> {
  const result = await runner(options);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new CommandFailedError(
      `${[options.command, ...options.args].join(" ")} failed with exit code ${result.exitCode}` +
        (detail ? `:\n${detail}` : "")
    );
  }
  return result;
}
