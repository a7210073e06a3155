import { parsePort, ValidationError } from "../../src/index.js";
import type { TransportMode } from "../../src/index.js";
import { PHASES } from "./config.js";
import type { Phase } from "./types.js";

export interface DriverFlags {
  host: string;
  port: string;
  embedded: boolean;
  placeholder: boolean;
  skip: string[];
}

export interface DriverOptions {
  host: string;
  port: number;
  mode: TransportMode;
  skip: Phase[];
}

export function parseSkip(names: string[]): Phase[] {
  return names.map((name) => {
    const phase = PHASES.find((p) => p === name);
    if (!phase) {
      throw new ValidationError(`Unknown phase '${name}'. Expected one of: ${PHASES.join(", ")}`);
    }
    return phase;
  });
}

/**
 * Validate every driver flag. Runs before the client is opened, so a bad
 * flag never leaves a client behind.
 */
export function resolveDriverOptions(flags: DriverFlags): DriverOptions {
  let mode: TransportMode = "remote";
  if (flags.embedded) mode = "embedded";
  if (flags.placeholder) mode = "placeholder";

  return {
    host: flags.host,
    port: parsePort(flags.port),
    mode,
    skip: parseSkip(flags.skip),
  };
}
