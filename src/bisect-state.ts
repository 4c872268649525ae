import fs from "fs";
import { z } from "zod";
import {
  BisectAlreadyRunningError,
  BisectStateFileError,
  NoBisectSessionError,
  NoCulpritError,
  NoNodesFoundError,
} from "./errors.js";
import { safeJsonParse, writeText } from "./utils.js";

export type IdleState = {
  status: "idle";
  all: string[];
};

export type RunningState = {
  status: "running";
  all: string[];
  /** Candidates still known to contain the culprit. */
  range: string[];
  /** Nodes enabled for the test in progress. */
  active: string[];
  launchArgs: string[];
};

export type ResolvedState = {
  status: "resolved";
  all: string[];
  culprit: string;
  launchArgs: string[];
};

export type BisectState = IdleState | RunningState | ResolvedState;

export const IDLE: IdleState = { status: "idle", all: [] };

export function assertCanStart(state: BisectState): asserts state is IdleState {
  if (state.status === "running") {
    throw new BisectAlreadyRunningError(
      "A bisect session is already running. Use 'comfy node bisect reset' to abandon it."
    );
  }
  if (state.status === "resolved") {
    throw new BisectAlreadyRunningError(
      "The previous bisect session was resolved but not reset. Run 'comfy node bisect reset' first."
    );
  }
}

export function startBisect(
  state: BisectState,
  nodes: readonly string[],
  pinned: ReadonlySet<string>,
  launchArgs: readonly string[]
): RunningState {
  assertCanStart(state);
  const candidates = dedupe(nodes.filter((name) => !pinned.has(name)));
  if (candidates.length === 0) {
    throw new NoNodesFoundError();
  }
  return {
    status: "running",
    all: candidates,
    range: [...candidates],
    active: [...candidates],
    launchArgs: [...launchArgs],
  };
}

/**
 * The probe set did not reproduce the problem: the culprit is in the part
 * of the range that was disabled.
 */
export function markGood(state: BisectState): RunningState | ResolvedState {
  const running = requireRunning(state);
  const active = new Set(running.active);
  return narrow(
    running,
    running.range.filter((name) => !active.has(name))
  );
}

/**
 * The probe set reproduced the problem: the culprit is one of the
 * enabled nodes.
 */
export function markBad(state: BisectState): RunningState | ResolvedState {
  const running = requireRunning(state);
  return narrow(running, running.active);
}

export function resetBisect(): IdleState {
  return { status: "idle", all: [] };
}

/** Nodes to disable so that exactly `active` is enabled. */
export function inactiveNodes(state: RunningState): string[] {
  const active = new Set(state.active);
  return state.all.filter((name) => !active.has(name));
}

function narrow(state: RunningState, range: string[]): RunningState | ResolvedState {
  if (range.length === 0) {
    throw new NoCulpritError(
      "No candidate nodes remain: the recorded answers rule out every node. Run 'comfy node bisect reset'."
    );
  }
  if (range.length === 1) {
    return {
      status: "resolved",
      all: state.all,
      culprit: range[0],
      launchArgs: state.launchArgs,
    };
  }
  return {
    status: "running",
    all: state.all,
    range,
    active: range.slice(Math.floor(range.length / 2)),
    launchArgs: state.launchArgs,
  };
}

function requireRunning(state: BisectState): RunningState {
  if (state.status !== "running") {
    throw new NoBisectSessionError();
  }
  return state;
}

function dedupe(names: string[]): string[] {
  return [...new Set(names)];
}

// On-disk record: {status, all, range, active, launch_args}.

const StateRecordSchema = z
  .object({
    status: z.enum(["idle", "running", "resolved"]),
    all: z.array(z.string()),
    range: z.array(z.string()),
    active: z.array(z.string()),
    launch_args: z.array(z.string()).default([]),
  })
  .superRefine((record, ctx) => {
    const all = new Set(record.all);
    const range = new Set(record.range);
    if (!record.range.every((name) => all.has(name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "range must be a subset of all" });
    }
    if (!record.active.every((name) => range.has(name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "active must be a subset of range" });
    }
    if (record.status === "resolved" && (record.range.length !== 1 || record.active.length > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "a resolved session has exactly one node in range and none active",
      });
    }
    if (
      record.status === "idle" &&
      (!sameList(record.range, record.all) || !sameList(record.active, record.all))
    ) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "an idle session has range and active equal to all" });
    }
  });

export type BisectStateRecord = {
  status: BisectState["status"];
  all: string[];
  range: string[];
  active: string[];
  launch_args: string[];
};

export function toRecord(state: BisectState): BisectStateRecord {
  switch (state.status) {
    case "idle":
      return {
        status: "idle",
        all: state.all,
        range: state.all,
        active: state.all,
        launch_args: [],
      };
    case "running":
      return {
        status: "running",
        all: state.all,
        range: state.range,
        active: state.active,
        launch_args: state.launchArgs,
      };
    case "resolved":
      return {
        status: "resolved",
        all: state.all,
        range: [state.culprit],
        active: [],
        launch_args: state.launchArgs,
      };
  }
}

export function fromRecord(value: unknown): BisectState {
  const parsed = StateRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new BisectStateFileError(
      `Invalid bisect state: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`
    );
  }
  const record = parsed.data;
  switch (record.status) {
    case "idle":
      return { status: "idle", all: record.all };
    case "running":
      return {
        status: "running",
        all: record.all,
        range: record.range,
        active: record.active,
        launchArgs: record.launch_args,
      };
    case "resolved":
      return {
        status: "resolved",
        all: record.all,
        culprit: record.range[0],
        launchArgs: record.launch_args,
      };
  }
}

/**
 * Reads the session state; a missing file is an idle session.
 */
export function loadBisectState(filePath: string): BisectState {
  if (!fs.existsSync(filePath)) {
    return IDLE;
  }
  const raw = fs.readFileSync(filePath, "utf8");
  const value = safeJsonParse(raw);
  if (value === undefined) {
    throw new BisectStateFileError(`Bisect state file is not valid JSON: ${filePath}`);
  }
  try {
    return fromRecord(value);
  } catch (error) {
    if (error instanceof BisectStateFileError) {
      throw new BisectStateFileError(`${error.message} (${filePath})`);
    }
    throw error;
  }
}

export function saveBisectState(filePath: string, state: BisectState): void {
  writeText(filePath, JSON.stringify(toRecord(state)));
}

export function clearBisectState(filePath: string): boolean {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  fs.rmSync(filePath, { force: true });
  return true;
}

export function describeBisectState(state: BisectState): string {
  switch (state.status) {
    case "idle":
      return "BisectState(status=idle)";
    case "resolved":
      return `BisectState(status=resolved)\nculprit: ${state.culprit}`;
    case "running": {
      const lines = state.active.map(
        (name, index) => `${String(index + 1).padStart(3)}. ${name}`
      );
      return [
        "BisectState(status=running)",
        `set of nodes with culprit: ${state.range.length}`,
        `set of nodes to test: ${state.active.length}`,
        "--------------------------",
        ...lines,
      ].join("\n");
    }
  }
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}
