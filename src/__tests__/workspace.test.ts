import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { MemoryConfigStore } from "../config.js";
import { COMFY_GITHUB_URL } from "../constants.js";
import {
  ConflictingDirectivesError,
  InvalidExplicitPathError,
  NoWorkspaceFoundError,
} from "../errors.js";
import { Logger } from "../logger.js";
import { CheckoutInfo, CheckoutProbe, WorkspaceDirectives } from "../types.js";
import {
  classifyDirectory,
  recordRecentWorkspace,
  requireInstalled,
  resolveWorkspace,
  ResolveContext,
} from "../workspace.js";

class MapProbe implements CheckoutProbe {
  constructor(private readonly repos: Record<string, CheckoutInfo> = {}) {}

  async inspect(dirPath: string): Promise<CheckoutInfo | null> {
    return this.repos[path.resolve(dirPath)] ?? null;
  }
}

type Sandbox = {
  root: string;
  home: string;
  /** Creates `<root>/<name>` holding the installation marker. */
  workspace(name: string): string;
  plainDir(name: string): string;
  warnings: string[];
  context(overrides?: Partial<ResolveContext>): ResolveContext;
};

async function withSandbox(fn: (sandbox: Sandbox) => Promise<void>): Promise<void> {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "workspace-test-")));
  const home = path.join(root, "home");
  fs.mkdirSync(home);
  const warnings: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => warnings.push(message),
    error: () => {},
  };
  const sandbox: Sandbox = {
    root,
    home,
    warnings,
    workspace(name) {
      const dir = path.join(root, name);
      fs.mkdirSync(path.join(dir, "ComfyUI"), { recursive: true });
      return dir;
    },
    plainDir(name) {
      const dir = path.join(root, name);
      fs.mkdirSync(dir, { recursive: true });
      return dir;
    },
    context(overrides = {}) {
      return {
        config: new MemoryConfigStore(),
        cwd: sandbox.plainDir("elsewhere"),
        probe: new MapProbe(),
        platform: "linux",
        homeDir: home,
        logger,
        ...overrides,
      };
    },
  };
  try {
    await fn(sandbox);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

function resolve(directives: WorkspaceDirectives, context: ResolveContext) {
  return resolveWorkspace(directives, context);
}

test("directives are mutually exclusive and checked first", async () => {
  await withSandbox(async (sandbox) => {
    await assert.rejects(resolve({ workspace: "/does/not/exist", recent: true }, sandbox.context()), {
      name: "ConflictingDirectivesError",
      message: "Options --workspace, --recent are mutually exclusive.",
    });
    await assert.rejects(
      resolve({ recent: true, here: true }, sandbox.context()),
      ConflictingDirectivesError
    );
  });
});

test("a conflict touches neither the config store nor the filesystem", async () => {
  await withSandbox(async (sandbox) => {
    const config = new MemoryConfigStore({
      default_workspace_path: sandbox.workspace("default"),
      recent_workspace_path: sandbox.workspace("recent"),
    });
    const before = config.snapshot();
    const probe: CheckoutProbe = {
      inspect: async (dirPath) => {
        assert.fail(`checkout probe consulted for ${dirPath}`);
      },
    };

    await assert.rejects(
      resolve(
        { workspace: sandbox.workspace("explicit"), here: true },
        sandbox.context({ config, probe, cwd: sandbox.workspace("cwd") })
      ),
      {
        name: "ConflictingDirectivesError",
        message: "Options --workspace, --here are mutually exclusive.",
      }
    );
    assert.deepEqual(config.snapshot(), before);
  });
});

test("an explicit workspace must exist and hold an installation", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.workspace("ws");
    const config = new MemoryConfigStore({ default_workspace_path: sandbox.workspace("default") });

    assert.deepEqual(await resolve({ workspace: ws }, sandbox.context({ config })), {
      path: ws,
      kind: "specified",
    });

    const missing = path.join(sandbox.root, "missing");
    await assert.rejects(resolve({ workspace: missing }, sandbox.context({ config })), {
      message: `Workspace path not found: ${missing}`,
    });

    const empty = sandbox.plainDir("empty");
    await assert.rejects(
      resolve({ workspace: empty }, sandbox.context({ config })),
      InvalidExplicitPathError
    );
  });
});

test("explicit paths are relative to cwd and may use ~", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.workspace("home/comfy-ws");
    assert.equal((await resolve({ workspace: "~/comfy-ws" }, sandbox.context())).path, ws);
    assert.equal(
      (await resolve({ workspace: "comfy-ws" }, sandbox.context({ cwd: sandbox.home }))).path,
      ws
    );
  });
});

test("install accepts an explicit path that holds nothing yet", async () => {
  await withSandbox(async (sandbox) => {
    const target = path.join(sandbox.root, "new-ws");
    assert.deepEqual(
      await resolve({ workspace: target }, sandbox.context({ purpose: "install" })),
      { path: target, kind: "specified" }
    );
  });
});

test("--recent needs a valid recent workspace", async () => {
  await withSandbox(async (sandbox) => {
    await assert.rejects(resolve({ recent: true }, sandbox.context()), {
      message: "No recent workspace has been set.",
    });

    const stale = path.join(sandbox.root, "gone");
    const staleConfig = new MemoryConfigStore({ recent_workspace_path: stale });
    await assert.rejects(resolve({ recent: true }, sandbox.context({ config: staleConfig })), {
      message: `The recent workspace ${stale} is not a valid ComfyUI workspace.`,
    });

    const ws = sandbox.workspace("recent");
    const config = new MemoryConfigStore({ recent_workspace_path: ws });
    assert.deepEqual(await resolve({ recent: true }, sandbox.context({ config })), {
      path: ws,
      kind: "recent",
    });
  });
});

test("--here resolves the current directory or fails", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.workspace("here");
    assert.deepEqual(await resolve({ here: true }, sandbox.context({ cwd: ws })), {
      path: ws,
      kind: "current_dir",
    });

    const plain = sandbox.plainDir("plain");
    await assert.rejects(resolve({ here: true }, sandbox.context({ cwd: plain })), InvalidExplicitPathError);
    assert.deepEqual(
      await resolve({ here: true }, sandbox.context({ cwd: plain, purpose: "install" })),
      { path: plain, kind: "current_dir" }
    );
  });
});

test("the user default comes before the current directory", async () => {
  await withSandbox(async (sandbox) => {
    const preferred = sandbox.workspace("default");
    const cwd = sandbox.workspace("cwd");
    const config = new MemoryConfigStore({ default_workspace_path: preferred });

    assert.deepEqual(await resolve({}, sandbox.context({ config, cwd })), {
      path: preferred,
      kind: "default",
    });
  });
});

test("an invalid default is skipped with a warning", async () => {
  await withSandbox(async (sandbox) => {
    const cwd = sandbox.workspace("cwd");
    const broken = path.join(sandbox.root, "broken");
    const config = new MemoryConfigStore({ default_workspace_path: broken });
    const context = sandbox.context({ config, cwd });

    assert.deepEqual(await resolve({}, context), { path: cwd, kind: "current_dir" });
    assert.deepEqual(sandbox.warnings, [
      `The default workspace ${broken} is not a valid ComfyUI workspace.`,
    ]);
  });
});

test("a checkout containing the current directory selects its parent", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.plainDir("checkout-ws");
    const app = sandbox.plainDir("checkout-ws/ComfyUI");
    const probe = new MapProbe({ [app]: { root: app, remoteUrls: [COMFY_GITHUB_URL] } });

    assert.deepEqual(await resolve({}, sandbox.context({ cwd: app, probe })), {
      path: ws,
      kind: "current_dir",
    });
  });
});

test("a custom node's own repository is looked through", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.plainDir("nodes-ws");
    const app = sandbox.plainDir("nodes-ws/ComfyUI");
    const node = sandbox.plainDir("nodes-ws/ComfyUI/custom_nodes/some-node");
    const probe = new MapProbe({
      [node]: { root: node, remoteUrls: ["https://example.com/some-node.git"] },
      [app]: { root: app, remoteUrls: [COMFY_GITHUB_URL] },
    });

    assert.equal(await classifyDirectory(node, probe), ws);
    assert.deepEqual(await resolve({}, sandbox.context({ cwd: node, probe })), {
      path: ws,
      kind: "current_dir",
    });
  });
});

test("unrelated checkouts are not workspaces", async () => {
  await withSandbox(async (sandbox) => {
    const repo = sandbox.plainDir("other-repo");
    const probe = new MapProbe({ [repo]: { root: repo, remoteUrls: ["https://example.com/x.git"] } });
    assert.equal(await classifyDirectory(repo, probe), null);
  });
});

test("the current directory comes before the recent workspace", async () => {
  await withSandbox(async (sandbox) => {
    const cwd = sandbox.workspace("cwd");
    const config = new MemoryConfigStore({ recent_workspace_path: sandbox.workspace("recent") });

    assert.deepEqual(await resolve({}, sandbox.context({ config, cwd })), {
      path: cwd,
      kind: "current_dir",
    });
    assert.equal(config.get("recent_workspace_path"), path.join(sandbox.root, "recent"));
  });
});

test("the recent workspace is used when nothing closer matches", async () => {
  await withSandbox(async (sandbox) => {
    const ws = sandbox.workspace("recent");
    const config = new MemoryConfigStore({ recent_workspace_path: ws });
    assert.deepEqual(await resolve({}, sandbox.context({ config })), { path: ws, kind: "recent" });
  });
});

test("with nothing configured the platform fallback is created", async () => {
  await withSandbox(async (sandbox) => {
    const linux = await resolve({}, sandbox.context());
    assert.deepEqual(linux, { path: path.join(sandbox.home, "comfy"), kind: "fallback" });
    assert.ok(fs.statSync(linux.path).isDirectory());

    const mac = await resolve({}, sandbox.context({ platform: "darwin" }));
    assert.equal(mac.path, path.join(sandbox.home, "Documents", "comfy"));
    assert.ok(fs.statSync(mac.path).isDirectory());

    assert.throws(() => requireInstalled(linux), NoWorkspaceFoundError);
  });
});

test("an uncreatable fallback means no workspace", async () => {
  await withSandbox(async (sandbox) => {
    const blocker = path.join(sandbox.root, "file-home");
    fs.writeFileSync(blocker, "not a directory");
    await assert.rejects(
      resolve({}, sandbox.context({ homeDir: blocker })),
      NoWorkspaceFoundError
    );
  });
});

test("recording the recent workspace stores an absolute path", () => {
  const config = new MemoryConfigStore();
  recordRecentWorkspace(config, "relative/ws");
  assert.equal(config.get("recent_workspace_path"), path.resolve("relative/ws"));
});
