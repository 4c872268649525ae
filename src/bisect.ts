import {
  assertCanStart,
  BisectState,
  clearBisectState,
  describeBisectState,
  IdleState,
  inactiveNodes,
  loadBisectState,
  markBad,
  markGood,
  resetBisect,
  ResolvedState,
  RunningState,
  saveBisectState,
  startBisect,
} from "./bisect-state.js";
import { BisectStateFileError, PluginManagerError } from "./errors.js";
import { Logger, silentLogger, style } from "./logger.js";
import { PluginManager } from "./manager.js";

export type BisectEngineOptions = {
  /** JSON file holding the session between invocations. */
  stateFile: string;
  manager: PluginManager;
  /** Launches the application in the foreground; resolves to its exit code. */
  relaunch: (launchArgs: string[]) => Promise<number>;
  out?: (message: string) => void;
  logger?: Logger;
};

export type BisectOutcome =
  | { status: "running"; state: RunningState; launchExitCode?: number }
  | { status: "resolved"; culprit: string }
  | { status: "idle"; state: IdleState; hadSession: boolean };

/**
 * Drives one bisect transition per process invocation. No file locking:
 * concurrent invocations race and the last write wins.
 */
export class BisectEngine {
  private readonly out: (message: string) => void;
  private readonly logger: Logger;

  constructor(private readonly options: BisectEngineOptions) {
    this.out = options.out ?? ((message) => console.log(message));
    this.logger = options.logger ?? silentLogger;
  }

  load(): BisectState {
    return loadBisectState(this.options.stateFile);
  }

  /**
   * Records every enabled node as the starting set, which is known to show
   * the problem, then takes the first halving step as if it were marked bad.
   */
  async start(pinned: ReadonlySet<string>, launchArgs: string[]): Promise<BisectOutcome> {
    const current = this.load();
    assertCanStart(current);

    const nodes = await this.options.manager.listEnabled();
    const started = startBisect(current, nodes, pinned, launchArgs);
    saveBisectState(this.options.stateFile, started);

    this.out(`Bisect session started.\n${describeBisectState(started)}`);
    if (pinned.size > 0) {
      this.out(`Pinned nodes: ${[...pinned].join(", ")}`);
    }
    return this.step(started, markBad);
  }

  good(): Promise<BisectOutcome> {
    return this.step(this.load(), markGood);
  }

  bad(): Promise<BisectOutcome> {
    return this.step(this.load(), markBad);
  }

  /**
   * Re-enables every node of the session and forgets it. Safe to repeat.
   */
  async reset(): Promise<BisectOutcome> {
    let state: BisectState;
    try {
      state = this.load();
    } catch (error) {
      if (!(error instanceof BisectStateFileError)) {
        throw error;
      }
      this.logger.warn(
        `${error.message}; discarding it without re-enabling nodes.\n` +
          "Check 'comfy node simple-show disabled' and re-enable nodes with 'comfy node enable <names>'."
      );
      state = resetBisect();
    }

    if (state.all.length > 0) {
      await this.options.manager.enable(state.all);
    }
    const hadSession = clearBisectState(this.options.stateFile);
    this.out(hadSession ? "Bisect session reset." : "No bisect session to reset.");
    return { status: "idle", state: resetBisect(), hadSession };
  }

  private async step(
    current: BisectState,
    transition: (state: BisectState) => RunningState | ResolvedState
  ): Promise<BisectOutcome> {
    const next = transition(current);
    saveBisectState(this.options.stateFile, next);

    if (next.status === "resolved") {
      this.out(style.bold(`Problematic node identified: ${next.culprit}`));
      await this.reset();
      return { status: "resolved", culprit: next.culprit };
    }

    await this.apply(next);
    this.out(describeBisectState(next));
    const launchExitCode = await this.options.relaunch(next.launchArgs);
    return { status: "running", state: next, launchExitCode };
  }

  private async apply(state: RunningState): Promise<void> {
    try {
      await this.options.manager.enable(state.active);
      await this.options.manager.disable(inactiveNodes(state));
    } catch (error) {
      if (error instanceof PluginManagerError) {
        throw new PluginManagerError(
          `${error.message}\nNode states may be partially applied; run 'comfy node bisect reset' to re-enable all nodes.`
        );
      }
      throw error;
    }
  }
}
