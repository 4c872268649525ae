import { ConfigStore } from "./config.js";
import { DEFAULT_PORT, MIN_PYTHON_VERSION, PythonVersion } from "./constants.js";
import { CommandRunner, runCommand } from "./exec.js";
import { formatBackground, isServerRunning, liveBackground } from "./launch.js";
import { style } from "./logger.js";
import { ResolvedWorkspace } from "./types.js";

export type PythonCheck = {
  command: string;
  found: boolean;
  version?: string;
  versionOk?: boolean;
  error?: string;
};

export async function checkPython(
  command: string,
  runner: CommandRunner = runCommand
): Promise<PythonCheck> {
  let raw: string;
  try {
    const result = await runner({
      command,
      args: ["--version"],
      cwd: process.cwd(),
      captureStdout: true,
      captureStderr: true,
    });
    if (result.exitCode !== 0) {
      return { command, found: false, error: `${command} --version exited with ${result.exitCode}` };
    }
    raw = `${result.stdout}${result.stderr}`.trim();
  } catch {
    return { command, found: false, error: `Command not found: ${command}` };
  }

  const parsed = parsePythonVersion(raw);
  if (!parsed) {
    return { command, found: true, error: `Unable to parse version output for ${command}` };
  }
  const versionOk = meetsMinimum(parsed, MIN_PYTHON_VERSION);
  const [major, minor] = MIN_PYTHON_VERSION;
  return {
    command,
    found: true,
    version: formatPythonVersion(parsed),
    versionOk,
    error: versionOk ? undefined : `Python ${major}.${minor} or higher is required to run ComfyUI.`,
  };
}

/** Reads `Python X.Y[.Z]` as printed by `python --version`. */
export function parsePythonVersion(output: string): PythonVersion | null {
  const match = output.match(/Python (\d+)\.(\d+)(?:\.(\d+))?/);
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3] ?? 0)];
}

export function meetsMinimum(version: PythonVersion, minimum: PythonVersion): boolean {
  for (let i = 0; i < 3; i += 1) {
    if (version[i] !== minimum[i]) return version[i] > minimum[i];
  }
  return true;
}

export const formatPythonVersion = (version: PythonVersion) => version.join(".");

export type EnvironmentReport = Array<[string, string]>;

export async function collectEnvironment(options: {
  config: ConfigStore;
  python: string;
  workspace: ResolvedWorkspace | null;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  probeServer?: (host: string, port: number) => Promise<boolean>;
}): Promise<EnvironmentReport> {
  const env = options.env ?? process.env;
  const { config } = options;
  const python = await checkPython(options.python, options.runner);
  const probeServer = options.probeServer ?? isServerRunning;
  const background = liveBackground(config);

  const pythonVersion = !python.found
    ? style.red("not found")
    : python.versionOk === false
      ? style.red(python.version ?? "unknown")
      : (python.version ?? "unknown");

  const rows: EnvironmentReport = [
    ["Python Executable", python.command],
    ["Python Version", pythonVersion],
    ["Virtualenv Path", env.VIRTUAL_ENV || "Not Used"],
    ["Conda Env", env.CONDA_DEFAULT_ENV || "Not Used"],
    ["Config Path", config.filePath ?? "(in memory)"],
    ["Default ComfyUI workspace", config.get("default_workspace_path") ?? "No default ComfyUI workspace"],
    ["Default ComfyUI launch extra options", config.get("default_launch_extras") || "None"],
    ["Recent ComfyUI workspace", config.get("recent_workspace_path") ?? "No recent run"],
    ["Background ComfyUI", background ? formatBackground(background) : "No"],
    [
      "Comfy Server Running",
      (await probeServer("localhost", DEFAULT_PORT))
        ? `${style.green("Yes")} http://localhost:${DEFAULT_PORT}`
        : "No",
    ],
    [
      "Current selected workspace",
      options.workspace ? `${options.workspace.path} (${options.workspace.kind})` : "None",
    ],
  ];
  return rows;
}

export function formatReport(rows: EnvironmentReport): string {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`).join("\n");
}
