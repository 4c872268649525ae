import fs from "fs";
import path from "path";
import {
  COMFY_GITHUB_URL,
  COMFY_MANAGER_GITHUB_URL,
  CUSTOM_NODES_DIRNAME,
  GpuOption,
  MANAGER_DIRNAME,
} from "./constants.js";
import { CliError, errorMessage } from "./errors.js";
import { CommandRunner, runChecked, runCommand } from "./exec.js";
import { gitCheckout, gitClone, gitPull } from "./git.js";
import { Logger, silentLogger } from "./logger.js";
import { CheckoutProbe, Platform } from "./types.js";
import { appDir, isComfyCheckout } from "./workspace.js";

export type InstallOptions = {
  workspace: string;
  url?: string;
  managerUrl?: string;
  commit?: string;
  restore?: boolean;
  skipManager?: boolean;
  skipRequirement?: boolean;
  gpu?: GpuOption;
  platform: Platform;
  python: string;
  probe: CheckoutProbe;
  runner?: CommandRunner;
  logger?: Logger;
};

const TORCH_PACKAGES = ["torch", "torchvision", "torchaudio"];

/**
 * pip arguments that install PyTorch for the given accelerator, or null
 * when nothing needs installing.
 */
export function torchInstallArgs(gpu: GpuOption, platform: Platform): string[] | null {
  switch (gpu) {
    case "nvidia":
      if (platform === "darwin") {
        throw new CliError("Nvidia GPUs are not supported on macOS.");
      }
      return [
        "install",
        ...TORCH_PACKAGES,
        "--extra-index-url",
        "https://download.pytorch.org/whl/cu121",
      ];
    case "amd":
      if (platform === "win32") {
        return ["install", "torch-directml"];
      }
      if (platform === "linux") {
        return [
          "install",
          ...TORCH_PACKAGES,
          "--extra-index-url",
          "https://download.pytorch.org/whl/rocm6.0",
        ];
      }
      return null;
    case "m-series":
      if (platform !== "darwin") {
        throw new CliError(`Apple M-series GPUs are only available on macOS, not ${platform}.`);
      }
      return [
        "install",
        "--pre",
        ...TORCH_PACKAGES,
        "--extra-index-url",
        "https://download.pytorch.org/whl/nightly/cpu",
      ];
    case "cpu":
      return [
        "install",
        ...TORCH_PACKAGES,
        "--extra-index-url",
        "https://download.pytorch.org/whl/cpu",
      ];
  }
}

export async function installComfy(options: InstallOptions): Promise<string> {
  const runner = options.runner ?? runCommand;
  const logger = options.logger ?? silentLogger;
  const url = options.url ?? COMFY_GITHUB_URL;
  const repoDir = appDir(options.workspace);

  const checkout = await options.probe.inspect(repoDir);
  const installed =
    checkout !== null &&
    isComfyCheckout(checkout) &&
    path.resolve(checkout.root) === path.resolve(repoDir);

  if (installed && !options.restore) {
    throw new CliError(
      `ComfyUI is already installed at the specified path: ${repoDir}\n` +
        "If you want to restore dependencies, add the '--restore' option."
    );
  }

  // Validated before cloning so a bad combination fails early.
  const torchArgs = options.gpu ? torchInstallArgs(options.gpu, options.platform) : null;

  if (!installed) {
    if (fs.existsSync(repoDir) && fs.readdirSync(repoDir).length > 0) {
      throw new CliError(
        `${repoDir} already exists and is not a ComfyUI checkout. Remove it or pick another workspace.`
      );
    }
    console.log(`Installing from '${url}' to '${repoDir}'`);
    await gitClone(url, repoDir, runner);
    if (options.commit) {
      await gitCheckout(repoDir, options.commit, runner);
    }
  }

  if (torchArgs) {
    await pip(options.python, torchArgs, repoDir, runner).catch((error: unknown) => {
      throw new CliError(
        `Failed to install PyTorch dependencies. Check your environment ('comfy env') and try again.\n${errorMessage(error)}`
      );
    });
  }

  if (options.skipRequirement) {
    logger.info("Skipping requirements.txt (--skip-requirement).");
  } else {
    await installRequirements(options.python, repoDir, runner);
  }

  if (options.skipManager) {
    console.log("Skipping installation of ComfyUI-Manager. (by --skip-manager)");
    return repoDir;
  }

  const managerDir = path.join(repoDir, CUSTOM_NODES_DIRNAME, MANAGER_DIRNAME);
  if (fs.existsSync(managerDir)) {
    if (options.restore) {
      await installRequirements(options.python, managerDir, runner);
    } else {
      console.log(
        `Directory ${managerDir} already exists. Skipping installation of ComfyUI-Manager.\n` +
          "If you want to restore dependencies, add the '--restore' option."
      );
    }
  } else {
    console.log("\nInstalling ComfyUI-Manager..");
    await gitClone(options.managerUrl ?? COMFY_MANAGER_GITHUB_URL, managerDir, runner);
    await installRequirements(options.python, managerDir, runner);
  }

  return repoDir;
}

export async function updateComfy(
  repoDir: string,
  python: string,
  runner: CommandRunner = runCommand
): Promise<void> {
  console.log(`Updating ComfyUI in ${repoDir}...`);
  await gitPull(repoDir, runner);
  await installRequirements(python, repoDir, runner);
}

async function installRequirements(
  python: string,
  dir: string,
  runner: CommandRunner
): Promise<void> {
  if (!fs.existsSync(path.join(dir, "requirements.txt"))) {
    return;
  }
  await pip(python, ["install", "-r", "requirements.txt"], dir, runner);
}

async function pip(
  python: string,
  args: string[],
  cwd: string,
  runner: CommandRunner
): Promise<void> {
  await runChecked(
    {
      command: python,
      args: ["-m", "pip", ...args],
      cwd,
      inheritStdio: true,
    },
    runner
  );
}
