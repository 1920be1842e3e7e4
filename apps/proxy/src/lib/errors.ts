export class RetrievalError extends Error {
  readonly packageKey: string;
  readonly reason: string;
  readonly output: string;

  constructor(opts: { packageKey: string; reason: string; output: string }) {
    super(
      `Error running go get for package ${JSON.stringify(opts.packageKey)}: ${opts.reason}\n\nOutput:\n${opts.output}`
    );
    this.name = "RetrievalError";
    this.packageKey = opts.packageKey;
    this.reason = opts.reason;
    this.output = opts.output;
  }
}

export class VcsRootError extends Error {
  readonly startDir: string;

  constructor(startDir: string) {
    super("confused; vcs file in root?");
    this.name = "VcsRootError";
    this.startDir = startDir;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
