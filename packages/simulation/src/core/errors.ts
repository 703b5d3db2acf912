import type { ErrorKind } from "../types.js";

/** Misuse of an internal API, such as asking for an agent that does not exist. */
export class SimulationError extends Error {
  constructor(
    public kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "SimulationError";
  }
}

/** A persisted snapshot failed validation. The engine refuses to start from it. */
export class SnapshotError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "SnapshotError";
  }
}

export class ConfigError extends Error {
  constructor(
    public source: string,
    message: string,
  ) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
  }
}
