export type Platform = "linux" | "darwin" | "win32";

export type WorkspaceDirectives = {
  workspace?: string;
  recent?: boolean;
  here?: boolean;
};

export type WorkspaceKind =
  | "specified"
  | "recent"
  | "current_dir"
  | "default"
  | "fallback";

export type ResolvedWorkspace = {
  path: string;
  kind: WorkspaceKind;
};

export type CheckoutInfo = {
  /** Top-level directory of the repository containing the probed path. */
  root: string;
  remoteUrls: string[];
};

/**
 * Answers whether a directory belongs to a git checkout, and which remotes
 * it has. Returns null outside a repository.
 */
export interface CheckoutProbe {
  inspect(dirPath: string): Promise<CheckoutInfo | null>;
}

export type BackgroundRun = {
  listen: string;
  port: number;
  pid: number;
};
