import { GPU_OPTIONS, GpuOption } from "./constants.js";
import { UsageError } from "./errors.js";
import { isNodeSubcommand, NodeSubcommand } from "./manager.js";
import { WorkspaceDirectives } from "./types.js";

export type BisectAction = "start" | "good" | "bad" | "reset";

export type Command =
  | {
      name: "install";
      url?: string;
      managerUrl?: string;
      commit?: string;
      restore: boolean;
      skipManager: boolean;
      skipRequirement: boolean;
      gpu?: GpuOption;
    }
  | { name: "update"; target: "comfy" | "all" }
  | { name: "launch"; background: boolean; extra: string[] }
  | { name: "stop" }
  | { name: "which" }
  | { name: "env" }
  | { name: "set-default"; path: string; launchExtras: string }
  | { name: "node"; subcommand: NodeSubcommand; args: string[] }
  | { name: "model"; action: "list"; relativePath?: string }
  | { name: "model"; action: "remove"; relativePath?: string; names: string[]; confirm: boolean }
  | {
      name: "model";
      action: "download";
      url: string;
      relativePath?: string;
      filename?: string;
      civitaiToken?: string;
    }
  | {
      name: "bisect";
      action: BisectAction;
      stateFile?: string;
      pinnedNodes?: string;
      extra: string[];
    };

export type ParsedArgs = {
  directives: WorkspaceDirectives;
  help: boolean;
  command: Command | null;
};

const VALUE_FLAGS = new Set([
  "workspace",
  "url",
  "manager-url",
  "commit",
  "gpu",
  "launch-extras",
  "pinned-nodes",
  "state-file",
  "channel",
  "mode",
  "relative-path",
  "filename",
  "set-civitai-api-token",
]);

const BOOLEAN_FLAGS = new Set([
  "recent",
  "here",
  "background",
  "restore",
  "skip-manager",
  "skip-requirement",
  "confirm",
]);

// Forwarded to the manager unchanged.
const MANAGER_FLAGS = ["channel", "mode"];

const BISECT_ACTIONS: readonly BisectAction[] = ["start", "good", "bad", "reset"];

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const passthrough: string[] = [];
  let extra: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      extra = argv.slice(i + 1);
      break;
    }
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    if (VALUE_FLAGS.has(name)) {
      const value = inline ?? argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for --${name}.`);
      }
      if (inline === undefined) {
        i += 1;
      }
      values.set(name, value);
    } else if (BOOLEAN_FLAGS.has(name)) {
      if (inline !== undefined) {
        throw new UsageError(`--${name} does not take a value.`);
      }
      switches.add(name);
    } else if (positionals[0] === "node" && positionals[1] !== "bisect") {
      passthrough.push(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  const directives: WorkspaceDirectives = {};
  const workspace = values.get("workspace");
  if (workspace !== undefined) {
    directives.workspace = workspace;
  }
  if (switches.has("recent")) {
    directives.recent = true;
  }
  if (switches.has("here")) {
    directives.here = true;
  }

  if (positionals.length === 0) {
    return { directives, help, command: null };
  }

  return {
    directives,
    help,
    command: buildCommand(positionals, values, switches, passthrough, extra),
  };
}

function buildCommand(
  positionals: string[],
  values: Map<string, string>,
  switches: Set<string>,
  passthrough: string[],
  extra: string[]
): Command {
  const [name, ...rest] = positionals;

  switch (name) {
    case "install": {
      expectNoArguments(name, rest);
      const gpu = values.get("gpu");
      if (gpu !== undefined && !isGpuOption(gpu)) {
        throw new UsageError(`Invalid --gpu ${gpu}. Choose one of: ${GPU_OPTIONS.join(", ")}.`);
      }
      return {
        name,
        url: values.get("url"),
        managerUrl: values.get("manager-url"),
        commit: values.get("commit"),
        restore: switches.has("restore"),
        skipManager: switches.has("skip-manager"),
        skipRequirement: switches.has("skip-requirement"),
        gpu,
      };
    }
    case "update": {
      const target = rest[0] ?? "comfy";
      if (target !== "comfy" && target !== "all") {
        throw new UsageError(`Invalid target: ${target}. Allowed targets are 'all', 'comfy'.`);
      }
      expectNoArguments(name, rest.slice(1));
      return { name, target };
    }
    case "launch":
      expectNoArguments(name, rest);
      return { name, background: switches.has("background"), extra };
    case "stop":
    case "which":
    case "env":
      expectNoArguments(name, rest);
      return { name };
    case "set-default": {
      if (rest.length !== 1) {
        throw new UsageError("Usage: comfy set-default <path> [--launch-extras \"...\"]");
      }
      return { name, path: rest[0], launchExtras: values.get("launch-extras") ?? "" };
    }
    case "node":
      return buildNodeCommand(rest, values, passthrough, extra);
    case "model":
      return buildModelCommand(rest, values, switches);
    default:
      throw new UsageError(`Unknown command: ${name}. Run 'comfy --help' for usage.`);
  }
}

function buildNodeCommand(
  rest: string[],
  values: Map<string, string>,
  passthrough: string[],
  extra: string[]
): Command {
  const [subcommand, ...args] = rest;
  if (subcommand === undefined) {
    throw new UsageError("Missing node subcommand. Run 'comfy --help' for usage.");
  }

  if (subcommand === "bisect") {
    const action = args[0];
    if (!isBisectAction(action)) {
      throw new UsageError(`Usage: comfy node bisect <${BISECT_ACTIONS.join("|")}>`);
    }
    expectNoArguments(`node bisect ${action}`, args.slice(1));
    if (action !== "start" && (values.has("pinned-nodes") || extra.length > 0)) {
      throw new UsageError("--pinned-nodes and launch arguments are only accepted by 'bisect start'.");
    }
    return {
      name: "bisect",
      action,
      stateFile: values.get("state-file"),
      pinnedNodes: values.get("pinned-nodes"),
      extra,
    };
  }

  if (!isNodeSubcommand(subcommand)) {
    throw new UsageError(`Unknown node subcommand: ${subcommand}.`);
  }
  const forwarded = [...args, ...passthrough];
  for (const flag of MANAGER_FLAGS) {
    const value = values.get(flag);
    if (value !== undefined) {
      forwarded.push(`--${flag}`, value);
    }
  }
  return { name: "node", subcommand, args: [...forwarded, ...extra] };
}

function buildModelCommand(
  rest: string[],
  values: Map<string, string>,
  switches: Set<string>
): Command {
  const [action, ...args] = rest;
  const relativePath = values.get("relative-path");
  switch (action) {
    case "list":
      expectNoArguments("model list", args);
      return { name: "model", action, relativePath };
    case "remove":
      if (args.length === 0) {
        throw new UsageError("Usage: comfy model remove <names...> [--relative-path <path>] [--confirm]");
      }
      return { name: "model", action, relativePath, names: args, confirm: switches.has("confirm") };
    case "download": {
      expectNoArguments("model download", args);
      const url = values.get("url");
      if (url === undefined) {
        throw new UsageError("Missing --url for 'model download'.");
      }
      return {
        name: "model",
        action,
        url,
        relativePath,
        filename: values.get("filename"),
        civitaiToken: values.get("set-civitai-api-token"),
      };
    }
    default:
      throw new UsageError("Usage: comfy model <list|remove|download>");
  }
}

function expectNoArguments(command: string, rest: string[]): void {
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument for '${command}': ${rest.join(" ")}`);
  }
}

function isGpuOption(value: string): value is GpuOption {
  return GPU_OPTIONS.some((option) => option === value);
}

function isBisectAction(value: string | undefined): value is BisectAction {
  return BISECT_ACTIONS.some((action) => action === value);
}
