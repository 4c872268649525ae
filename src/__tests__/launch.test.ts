import assert from "node:assert/strict";
import { spawnSync } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { MemoryConfigStore } from "../config.js";
import { CliError, CommandFailedError } from "../errors.js";
import { RunOptions } from "../exec.js";
import {
  formatBackground,
  killProcessGroup,
  launchBackground,
  launchForeground,
  liveBackground,
  parseListenPort,
  resolveLaunchExtras,
  stopBackground,
} from "../launch.js";

async function withTmpDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "launch-test-"));
  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

function deadPid(): number {
  const result = spawnSync(process.execPath, ["-e", ""]);
  assert.ok(result.pid > 0);
  return result.pid;
}

test("foreground launch restarts while the app asks for a reboot", async () => {
  await withTmpDir(async (dir) => {
    const calls: RunOptions[] = [];
    const listenersBefore = process.listenerCount("SIGINT");

    const exitCode = await launchForeground({
      appDir: dir,
      python: "python3",
      configDir: dir,
      extra: ["--cpu"],
      runner: async (options) => {
        calls.push(options);
        const session = options.env?.__COMFY_CLI_SESSION__ ?? "";
        if (calls.length < 3) {
          fs.writeFileSync(`${session}.reboot`, "");
          return { exitCode: 0, stdout: "", stderr: "" };
        }
        return { exitCode: 7, stdout: "", stderr: "" };
      },
    });

    assert.equal(exitCode, 7);
    assert.equal(calls.length, 3);
    assert.deepEqual(calls[0].args, ["main.py", "--cpu"]);
    assert.equal(calls[0].cwd, dir);
    assert.equal(calls[0].inheritStdio, true);
    assert.equal(calls[0].env?.PYTHONIOENCODING, "utf-8");
    const session = calls[0].env?.__COMFY_CLI_SESSION__ ?? "";
    assert.equal(path.dirname(session), path.join(dir, "tmp"));
    assert.equal(fs.existsSync(`${session}.reboot`), false);
    assert.equal(process.listenerCount("SIGINT"), listenersBefore);
  });
});

test("saved launch extras apply only to the default workspace", () => {
  const config = new MemoryConfigStore({ default_launch_extras: "--cpu --port 9000" });
  assert.deepEqual(resolveLaunchExtras([], "default", config), ["--cpu", "--port", "9000"]);
  assert.deepEqual(resolveLaunchExtras([], "recent", config), []);
  assert.deepEqual(resolveLaunchExtras(["--lowvram"], "default", config), ["--lowvram"]);
});

test("listen address and port are read from launch args", () => {
  assert.deepEqual(parseListenPort([]), { listen: "127.0.0.1", port: 8188 });
  assert.deepEqual(parseListenPort(["--listen", "0.0.0.0", "--port", "9000"]), {
    listen: "0.0.0.0",
    port: 9000,
  });
  assert.deepEqual(parseListenPort(["--port", "abc"]), { listen: "127.0.0.1", port: 8188 });
});

test("a dead background record is forgotten", () => {
  const config = new MemoryConfigStore({
    background: { listen: "127.0.0.1", port: 8188, pid: deadPid() },
  });
  assert.equal(liveBackground(config), null);
  assert.equal(config.get("background"), undefined);

  config.set("background", { listen: "127.0.0.1", port: 8188, pid: process.pid });
  assert.equal(liveBackground(config)?.pid, process.pid);
});

test("stop kills the recorded run and forgets it", () => {
  const config = new MemoryConfigStore({
    background: { listen: "127.0.0.1", port: 8200, pid: 4321 },
  });
  const killed: number[] = [];
  const stopped = stopBackground(config, (pid) => {
    killed.push(pid);
    return true;
  });

  assert.deepEqual(killed, [4321]);
  assert.equal(formatBackground(stopped), "http://127.0.0.1:8200 (pid=4321)");
  assert.equal(config.get("background"), undefined);
  assert.throws(() => stopBackground(config, () => true), {
    message: "No ComfyUI is running in the background.",
  });
});

test("stop reports a process it could not kill", () => {
  const config = new MemoryConfigStore({
    background: { listen: "127.0.0.1", port: 8188, pid: 99 },
  });
  assert.throws(() => stopBackground(config, () => false), CliError);
  assert.equal(config.get("background"), undefined);
});

test("background launch waits for the ready line and records the run", async () => {
  await withTmpDir(async (dir) => {
    fs.writeFileSync(
      path.join(dir, "main.py"),
      "console.log('To see the GUI go to: http://127.0.0.1:8188');\nsetInterval(() => {}, 1000);\n"
    );
    const config = new MemoryConfigStore();

    const run = await launchBackground({
      appDir: dir,
      python: process.execPath,
      configDir: dir,
      extra: [],
      config,
      pollIntervalMs: 20,
      probeServer: async () => false,
    });

    try {
      assert.equal(run.listen, "127.0.0.1");
      assert.equal(run.port, 8188);
      assert.deepEqual(config.get("background"), run);
      await assert.rejects(
        launchBackground({
          appDir: dir,
          python: process.execPath,
          configDir: dir,
          extra: [],
          config,
          probeServer: async () => false,
        }),
        {
          message:
            "ComfyUI is already running in background.\nYou cannot start more than one background service.",
        }
      );
    } finally {
      killProcessGroup(run.pid);
    }
  });
});

test("background launch reports an app that exits early", async () => {
  await withTmpDir(async (dir) => {
    fs.writeFileSync(path.join(dir, "main.py"), "console.error('boom');\nprocess.exit(1);\n");
    const config = new MemoryConfigStore();

    await assert.rejects(
      launchBackground({
        appDir: dir,
        python: process.execPath,
        configDir: dir,
        extra: [],
        config,
        pollIntervalMs: 20,
        probeServer: async () => false,
      }),
      (error: unknown) => {
        assert.ok(error instanceof CommandFailedError);
        assert.equal(
          error.message,
          "Execution error: failed to launch ComfyUI (exit code 1).\n\nError log during ComfyUI execution:\nboom"
        );
        return true;
      }
    );
    assert.equal(config.get("background"), undefined);
  });
});

test("background launch refuses a port already in use", async () => {
  await withTmpDir(async (dir) => {
    await assert.rejects(
      launchBackground({
        appDir: dir,
        python: process.execPath,
        configDir: dir,
        extra: ["--port", "8300"],
        config: new MemoryConfigStore(),
        probeServer: async (_host, port) => port === 8300,
      }),
      { message: "The 8300 port is already in use. A new ComfyUI server cannot be launched." }
    );
  });
});
