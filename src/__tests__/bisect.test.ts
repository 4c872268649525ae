import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { BisectEngine } from "../bisect.js";
import { loadBisectState } from "../bisect-state.js";
import {
  BisectAlreadyRunningError,
  NoBisectSessionError,
  PluginManagerError,
} from "../errors.js";
import { Logger } from "../logger.js";
import { PluginManager } from "../manager.js";

class FakeManager implements PluginManager {
  readonly calls: string[][] = [];
  failOn: "enable" | "disable" | null = null;

  constructor(private readonly enabled: string[]) {}

  async listEnabled(): Promise<string[]> {
    this.calls.push(["list"]);
    return this.enabled;
  }

  async enable(names: readonly string[]): Promise<void> {
    this.record("enable", names);
  }

  async disable(names: readonly string[]): Promise<void> {
    this.record("disable", names);
  }

  private record(action: "enable" | "disable", names: readonly string[]): void {
    if (this.failOn === action) {
      throw new PluginManagerError(`ComfyUI-Manager '${action}' failed with exit code 1`);
    }
    if (names.length > 0) {
      this.calls.push([action, ...names]);
    }
  }
}

type Harness = {
  engine: BisectEngine;
  manager: FakeManager;
  stateFile: string;
  output: string[];
  launches: string[][];
  warnings: string[];
};

function withEngine(nodes: string[], fn: (harness: Harness) => Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bisect-engine-test-"));
  const stateFile = path.join(dir, "bisect_state.json");
  const manager = new FakeManager(nodes);
  const output: string[] = [];
  const launches: string[][] = [];
  const warnings: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => warnings.push(message),
    error: () => {},
  };
  const engine = new BisectEngine({
    stateFile,
    manager,
    relaunch: async (args) => {
      launches.push(args);
      return 0;
    },
    out: (message) => output.push(message),
    logger,
  });
  return fn({ engine, manager, stateFile, output, launches, warnings }).finally(() =>
    fs.rmSync(dir, { recursive: true, force: true })
  );
}

test("a full session isolates the faulty node and restores everything", async () => {
  await withEngine(["a", "b", "c", "d", "e"], async ({ engine, manager, stateFile, launches }) => {
    const started = await engine.start(new Set(), ["--cpu"]);
    assert.equal(started.status, "running");
    assert.deepEqual(launches, [["--cpu"]]);

    await engine.good();
    const outcome = await engine.bad();

    assert.deepEqual(outcome, { status: "resolved", culprit: "b" });
    assert.deepEqual(manager.calls, [
      ["list"],
      ["enable", "c", "d", "e"],
      ["disable", "a", "b"],
      ["enable", "b"],
      ["disable", "a", "c", "d", "e"],
      ["enable", "a", "b", "c", "d", "e"],
    ]);
    assert.deepEqual(launches, [["--cpu"], ["--cpu"]]);
    assert.equal(fs.existsSync(stateFile), false);
  });
});

test("start takes the first halving step and relaunches", async () => {
  await withEngine(["a", "b", "c"], async ({ engine, stateFile, launches }) => {
    const outcome = await engine.start(new Set(), []);

    assert.equal(outcome.status, "running");
    assert.deepEqual(launches, [[]]);
    assert.deepEqual(loadBisectState(stateFile), {
      status: "running",
      all: ["a", "b", "c"],
      range: ["a", "b", "c"],
      active: ["b", "c"],
      launchArgs: [],
    });
  });
});

test("pinned nodes are never disabled", async () => {
  await withEngine(["a", "keep", "b"], async ({ engine, manager, output }) => {
    await engine.start(new Set(["keep"]), []);

    assert.ok(manager.calls.every((call) => !call.includes("keep")));
    assert.equal(output[1], "Pinned nodes: keep");
  });
});

test("good right after start narrows to the disabled half", async () => {
  await withEngine(["a", "b"], async ({ engine }) => {
    await engine.start(new Set(), []);
    assert.deepEqual(await engine.good(), { status: "resolved", culprit: "a" });
  });
});

test("a single candidate is resolved by start itself", async () => {
  await withEngine(["only"], async ({ engine, manager, launches, output }) => {
    const outcome = await engine.start(new Set(), []);

    assert.deepEqual(outcome, { status: "resolved", culprit: "only" });
    assert.deepEqual(manager.calls, [["list"], ["enable", "only"]]);
    assert.deepEqual(launches, []);
    assert.equal(output.at(-1), "Bisect session reset.");
  });
});

test("start refuses while a session is running", async () => {
  await withEngine(["a", "b"], async ({ engine, manager }) => {
    await engine.start(new Set(), []);
    await assert.rejects(engine.start(new Set(), []), BisectAlreadyRunningError);
    assert.equal(manager.calls.filter(([action]) => action === "list").length, 1);
  });
});

test("good and bad need a session", async () => {
  await withEngine(["a", "b"], async ({ engine, manager, launches }) => {
    await assert.rejects(engine.good(), NoBisectSessionError);
    await assert.rejects(engine.bad(), NoBisectSessionError);
    assert.deepEqual(manager.calls, []);
    assert.deepEqual(launches, []);
  });
});

test("reset re-enables all nodes once and is safe to repeat", async () => {
  await withEngine(["a", "b", "c"], async ({ engine, manager, output, stateFile }) => {
    await engine.start(new Set(), []);
    await engine.bad();
    manager.calls.length = 0;

    const first = await engine.reset();
    const second = await engine.reset();

    assert.deepEqual(first, { status: "idle", state: { status: "idle", all: [] }, hadSession: true });
    assert.deepEqual(second, { status: "idle", state: { status: "idle", all: [] }, hadSession: false });
    assert.deepEqual(manager.calls, [["enable", "a", "b", "c"]]);
    assert.deepEqual(output.slice(-2), ["Bisect session reset.", "No bisect session to reset."]);
    assert.equal(fs.existsSync(stateFile), false);
  });
});

test("reset discards an unreadable state file", async () => {
  await withEngine(["a"], async ({ engine, manager, stateFile, warnings }) => {
    fs.writeFileSync(stateFile, "[]");
    const outcome = await engine.reset();

    assert.equal(outcome.status, "idle");
    assert.deepEqual(manager.calls, []);
    assert.equal(warnings.length, 1);
    assert.ok(
      warnings[0].endsWith(
        "discarding it without re-enabling nodes.\n" +
          "Check 'comfy node simple-show disabled' and re-enable nodes with 'comfy node enable <names>'."
      )
    );
    assert.equal(fs.existsSync(stateFile), false);
  });
});

test("a failed manager call points at reset and keeps the saved step", async () => {
  await withEngine(["a", "b", "c", "d"], async ({ engine, manager, stateFile, launches }) => {
    await engine.start(new Set(), []);
    manager.failOn = "disable";
    launches.length = 0;

    await assert.rejects(engine.bad(), (error: unknown) => {
      assert.ok(error instanceof PluginManagerError);
      assert.equal(
        error.message,
        "ComfyUI-Manager 'disable' failed with exit code 1\n" +
          "Node states may be partially applied; run 'comfy node bisect reset' to re-enable all nodes."
      );
      return true;
    });
    assert.deepEqual(launches, []);
    const saved = loadBisectState(stateFile);
    assert.equal(saved.status, "running");
    if (saved.status === "running") {
      assert.deepEqual(saved.range, ["c", "d"]);
      assert.deepEqual(saved.active, ["d"]);
    }
  });
});
