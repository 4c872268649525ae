export const COMFY_GITHUB_URL = "https://github.com/comfyanonymous/ComfyUI";
export const COMFY_MANAGER_GITHUB_URL = "https://github.com/ltdrdata/ComfyUI-Manager";

/** Subdirectory of a workspace that holds the application checkout. */
export const COMFY_DIRNAME = "ComfyUI";
export const MANAGER_DIRNAME = "ComfyUI-Manager";
export const CUSTOM_NODES_DIRNAME = "custom_nodes";
export const MANAGER_SCRIPT = "cm-cli.py";

// Remotes that identify a checkout of the application.
export const COMFY_ORIGIN_URLS: ReadonlySet<string> = new Set([
  "git@github.com:comfyanonymous/ComfyUI.git",
  "git@github.com:drip-art/comfy.git",
  "git@github.com:Comfy-Org/ComfyUI.git",
  "https://github.com/comfyanonymous/ComfyUI.git",
  "https://github.com/comfyanonymous/ComfyUI",
  "https://github.com/drip-art/ComfyUI.git",
  "https://github.com/drip-art/ComfyUI",
  "https://github.com/Comfy-Org/ComfyUI.git",
  "https://github.com/Comfy-Org/ComfyUI",
]);

export const CONFIG_DIR_ENV = "COMFY_CLI_CONFIG_DIR";
export const PYTHON_ENV = "COMFY_PYTHON";
export const SESSION_ENV = "__COMFY_CLI_SESSION__";
export const CONFIG_FILENAME = "config.json";
export const BISECT_STATE_FILENAME = "bisect_state.json";

export const DEFAULT_LISTEN = "127.0.0.1";
export const DEFAULT_PORT = 8188;
export const DEFAULT_MODEL_PATH = "models";
export const READY_MARKER = "To see the GUI go to:";

/** major, minor, micro */
export type PythonVersion = readonly [number, number, number];

export const MIN_PYTHON_VERSION: PythonVersion = [3, 9, 0];

export type GpuOption = "nvidia" | "amd" | "m-series" | "cpu";
export const GPU_OPTIONS: readonly GpuOption[] = ["nvidia", "amd", "m-series", "cpu"];
