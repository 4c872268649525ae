#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command, parseArgs, ParsedArgs } from "./args.js";
import { BisectEngine } from "./bisect.js";
import {
  ConfigStore,
  configDir,
  currentPlatform,
  FileConfigStore,
  pythonExecutable,
} from "./config.js";
import { BISECT_STATE_FILENAME } from "./constants.js";
import { CliError, errorMessage, InvalidExplicitPathError } from "./errors.js";
import { collectEnvironment, formatReport } from "./environment.js";
import { GitCheckoutProbe } from "./git.js";
import { installComfy, updateComfy } from "./install.js";
import {
  formatBackground,
  launchBackground,
  launchForeground,
  resolveLaunchExtras,
  stopBackground,
} from "./launch.js";
import { createLogger, Logger, style } from "./logger.js";
import { downloadModel, formatModelTable, listModels, modelDir, removeModels } from "./model.js";
import {
  lazyPluginManager,
  ManagerClient,
  parsePinnedNodes,
} from "./manager.js";
import { ResolvedWorkspace } from "./types.js";
import { resolveUserPath } from "./utils.js";
import {
  appDir,
  classifyDirectory,
  recordRecentWorkspace,
  requireInstalled,
  resolveWorkspace,
} from "./workspace.js";

type Context = {
  parsed: ParsedArgs;
  config: ConfigStore;
  configDir: string;
  cwd: string;
  python: string;
  probe: GitCheckoutProbe;
  logger: Logger;
};

const logger = createLogger();

main().catch((error: unknown) => {
  console.error(style.red(errorMessage(error)));
  process.exit(error instanceof CliError ? error.exitCode : 1);
});

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help || !parsed.command) {
    printHelp();
    process.exit(0);
  }

  const dir = configDir();
  const config = new FileConfigStore(dir);
  const context: Context = {
    parsed,
    config,
    configDir: dir,
    cwd: process.cwd(),
    python: pythonExecutable(config),
    probe: new GitCheckoutProbe(),
    logger,
  };
  logger.debug(`config: ${config.filePath}`);

  process.exitCode = await run(parsed.command, context);
}

async function run(command: Command, context: Context): Promise<number> {
  switch (command.name) {
    case "install":
      return runInstall(command, context);
    case "update":
      return runUpdate(command.target, context);
    case "launch":
      return runLaunch(command.background, command.extra, context);
    case "stop": {
      const stopped = stopBackground(context.config);
      console.log(`Background ComfyUI is stopped. (${formatBackground(stopped)})`);
      return 0;
    }
    case "which": {
      const workspace = await resolve(context);
      console.log(`Target ComfyUI path: ${appDir(workspace.path)}`);
      return 0;
    }
    case "env":
      return runEnv(context);
    case "set-default":
      return runSetDefault(command.path, command.launchExtras, context);
    case "node": {
      const app = await installedApp(context);
      const output = await managerFor(app, context).run([command.subcommand, ...command.args]);
      process.stdout.write(output);
      return 0;
    }
    case "bisect":
      return runBisect(command, context);
    case "model":
      return runModel(command, context);
  }
}

function resolve(
  context: Context,
  purpose: "operate" | "install" = "operate"
): Promise<ResolvedWorkspace> {
  return resolveWorkspace(context.parsed.directives, {
    config: context.config,
    cwd: context.cwd,
    probe: context.probe,
    logger: context.logger,
    purpose,
  });
}

async function installedApp(context: Context): Promise<string> {
  const workspace = requireInstalled(await resolve(context));
  recordRecentWorkspace(context.config, workspace);
  return appDir(workspace);
}

function managerFor(app: string, context: Context): ManagerClient {
  return new ManagerClient({
    appDir: app,
    python: context.python,
    configDir: context.configDir,
    logger: context.logger,
  });
}

async function runInstall(
  command: Extract<Command, { name: "install" }>,
  context: Context
): Promise<number> {
  const workspace = await resolve(context, "install");
  const repoDir = await installComfy({
    workspace: workspace.path,
    url: command.url,
    managerUrl: command.managerUrl,
    commit: command.commit,
    restore: command.restore,
    skipManager: command.skipManager,
    skipRequirement: command.skipRequirement,
    gpu: command.gpu,
    platform: currentPlatform(),
    python: context.python,
    probe: context.probe,
    logger: context.logger,
  });
  recordRecentWorkspace(context.config, workspace.path);
  console.log(`ComfyUI is installed at: ${repoDir}`);
  return 0;
}

async function runUpdate(target: "comfy" | "all", context: Context): Promise<number> {
  const app = await installedApp(context);
  if (target === "all") {
    process.stdout.write(await managerFor(app, context).run(["update", "all"]));
    return 0;
  }
  await updateComfy(app, context.python);
  return 0;
}

async function runLaunch(
  background: boolean,
  extra: string[],
  context: Context
): Promise<number> {
  const workspace = await resolve(context);
  requireInstalled(workspace);
  const app = appDir(workspace.path);
  const args = resolveLaunchExtras(extra, workspace.kind, context.config);
  recordRecentWorkspace(context.config, workspace.path);

  const options = {
    appDir: app,
    python: context.python,
    configDir: context.configDir,
    extra: args,
    logger: context.logger,
  };

  if (background) {
    const started = await launchBackground({ ...options, config: context.config });
    console.log(`ComfyUI is successfully launched in the background.\n${formatBackground(started)}`);
    return 0;
  }

  console.log(`Launching ComfyUI from: ${app}`);
  return launchForeground(options);
}

async function runEnv(context: Context): Promise<number> {
  let workspace: ResolvedWorkspace | null = null;
  try {
    workspace = await resolve(context);
  } catch (error) {
    if (!(error instanceof CliError)) {
      throw error;
    }
    context.logger.info(error.message);
  }
  const rows = await collectEnvironment({
    config: context.config,
    python: context.python,
    workspace,
  });
  console.log(formatReport(rows));
  return 0;
}

async function runSetDefault(
  target: string,
  launchExtras: string,
  context: Context
): Promise<number> {
  const resolved = resolveUserPath(target, context.cwd);
  if (!fs.existsSync(resolved)) {
    throw new InvalidExplicitPathError(`Path not found: ${resolved}`);
  }
  const workspace = await classifyDirectory(resolved, context.probe);
  if (!workspace) {
    throw new InvalidExplicitPathError(
      `Specified path is not a ComfyUI workspace or checkout: ${resolved}`
    );
  }

  const workspacePath = path.resolve(workspace);
  context.config.set("default_workspace_path", workspacePath);
  if (launchExtras.trim()) {
    context.config.set("default_launch_extras", launchExtras.trim());
  } else {
    context.config.delete("default_launch_extras");
  }
  console.log(`Specified path is set as default ComfyUI path: ${workspacePath}`);
  return 0;
}

async function runBisect(
  command: Extract<Command, { name: "bisect" }>,
  context: Context
): Promise<number> {
  const stateFile = command.stateFile
    ? resolveUserPath(command.stateFile, context.cwd)
    : path.join(context.configDir, BISECT_STATE_FILENAME);

  // Resolved once, on first use; reset of an absent session needs no workspace.
  let app: Promise<string> | null = null;
  const getApp = () => {
    app ??= installedApp(context);
    return app;
  };

  const engine = new BisectEngine({
    stateFile,
    manager: lazyPluginManager(async () => managerFor(await getApp(), context)),
    relaunch: async (launchArgs) =>
      launchForeground({
        appDir: await getApp(),
        python: context.python,
        configDir: context.configDir,
        extra: launchArgs,
        logger: context.logger,
      }),
    logger: context.logger,
  });

  switch (command.action) {
    case "start":
      await engine.start(parsePinnedNodes(command.pinnedNodes), command.extra);
      break;
    case "good":
      await engine.good();
      break;
    case "bad":
      await engine.bad();
      break;
    case "reset":
      await engine.reset();
      break;
  }
  // The relaunched application's own exit status is not the bisect step's.
  return 0;
}

async function runModel(
  command: Extract<Command, { name: "model" }>,
  context: Context
): Promise<number> {
  const app = await installedApp(context);
  switch (command.action) {
    case "list":
      console.log(formatModelTable(listModels(modelDir(app, command.relativePath))));
      return 0;
    case "remove": {
      const dir = modelDir(app, command.relativePath);
      if (listModels(dir).length === 0) {
        console.log("No models found to remove.");
        return 0;
      }
      const result = removeModels(dir, command.names, command.confirm);
      if (result.missing.length > 0) {
        console.log(
          `The following models were not found and cannot be removed: ${result.missing.join(", ")}`
        );
      }
      if (result.canceled) {
        console.log("Deletion canceled. Pass --confirm to delete the selected files.");
      }
      for (const deleted of result.deleted) {
        console.log(`Deleted: ${deleted}`);
      }
      return 0;
    }
    case "download": {
      if (command.civitaiToken !== undefined) {
        context.config.set("civitai_api_token", command.civitaiToken);
      }
      const downloaded = await downloadModel({
        appDir: app,
        url: command.url,
        relativePath: command.relativePath,
        filename: command.filename,
        civitaiToken: command.civitaiToken ?? context.config.get("civitai_api_token"),
        logger: context.logger,
      });
      console.log(`Downloaded ${downloaded.bytes} bytes to ${downloaded.path}`);
      return 0;
    }
  }
}

function printHelp(): void {
  console.log(`
Usage:
  comfy [--workspace <path> | --recent | --here] <command> [options]

Commands:
  install               Clone ComfyUI and ComfyUI-Manager into the workspace
    --url <url>           ComfyUI repository to clone
    --manager-url <url>   ComfyUI-Manager repository to clone
    --commit <ref>        Check out this commit after cloning
    --gpu <kind>          nvidia | amd | m-series | cpu
    --restore             Reinstall dependencies of an existing install
    --skip-manager        Do not install ComfyUI-Manager
    --skip-requirement    Do not install requirements.txt
  update [comfy|all]    Update ComfyUI, or everything through the manager
  launch [--background] [-- <extra args>]
  stop                  Stop the background ComfyUI
  which                 Print the ComfyUI directory that would be used
  env                   Print configuration and environment details
  set-default <path> [--launch-extras "<args>"]
  node <subcommand> [args] [--channel <name>] [--mode <mode>]
                        show | simple-show | install | reinstall | uninstall |
                        update | disable | enable | fix | save-snapshot |
                        restore-snapshot | restore-dependencies | clear
  node bisect start [--pinned-nodes a,b] [--state-file <path>] [-- <extra args>]
  node bisect good|bad|reset [--state-file <path>]
  model list [--relative-path <path>]
  model remove <names...> [--relative-path <path>] [--confirm]
  model download --url <url> [--relative-path <path>] [--filename <name>]
                 [--set-civitai-api-token <token>]

Options:
  --workspace <path>    Use this workspace
  --recent              Use the most recently used workspace
  --here                Use the workspace containing the current directory
  -h, --help            Show this help

Environment:
  LOG_LEVEL             debug | info | warn | error (default warn)
  COMFY_PYTHON          Python interpreter to run ComfyUI with
  COMFY_CLI_CONFIG_DIR  Directory holding config.json and bisect state
`);
}
