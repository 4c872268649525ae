export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends CliError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class ConflictingDirectivesError extends UsageError {
  constructor(directives: string[]) {
    super(
      `Options ${directives.map((name) => `--${name}`).join(", ")} are mutually exclusive.`
    );
  }
}

export class InvalidExplicitPathError extends CliError {}

export class NoWorkspaceFoundError extends CliError {}

export class BisectAlreadyRunningError extends CliError {}

export class NoBisectSessionError extends CliError {
  constructor() {
    super("No bisect session running. Start one with 'comfy node bisect start'.");
  }
}

export class NoNodesFoundError extends CliError {
  constructor() {
    super("No enabled custom nodes found to bisect.");
  }
}

export class NoCulpritError extends CliError {}

export class BisectStateFileError extends CliError {}

export class ManagerNotInstalledError extends CliError {}

export class PluginManagerError extends CliError {}

export class CommandFailedError extends CliError {}

export class ConfigError extends CliError {}

export class ModelDownloadError extends CliError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
