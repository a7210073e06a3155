// VectraEdge - Client Configuration

import type { ClientConfig, ClientOptions, TransportMode } from "./types.js";
import { ValidationError } from "./types.js";

const MODES: readonly TransportMode[] = ["embedded", "remote", "placeholder"];

/**
 * Resolve client options against environment variable defaults.
 * The returned config is frozen.
 */
export function resolveConfig(options: ClientOptions = {}): ClientConfig {
  const host = options.host ?? process.env.VECTRA_HOST ?? "127.0.0.1";
  const port = options.port ?? parsePort(process.env.VECTRA_PORT ?? "8080");
  const transportMode = options.mode ?? parseMode(process.env.VECTRA_MODE ?? "remote");
  const dataPath = options.dataPath ?? process.env.VECTRA_DATA_PATH ?? ":memory:";
  const adminApi = options.adminApi ?? process.env.VECTRA_ADMIN_API === "true";

  if (!host) {
    throw new ValidationError("Host must not be empty");
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid port: ${port}`);
  }

  return Object.freeze({
    host,
    port,
    transportMode,
    embeddedAvailable: options.embeddedAvailable ?? true,
    dataPath,
    adminApi,
  });
}

/**
 * Address of the server a remote client talks to.
 */
export function baseAddress(config: Pick<ClientConfig, "host" | "port">): string {
  return `http://${config.host}:${config.port}`;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid port: ${value}`);
  }
  return port;
}

function parseMode(value: string): TransportMode {
  const mode = MODES.find((m) => m === value);
  if (!mode) {
    throw new ValidationError(`Invalid mode: ${value}. Must be one of ${MODES.join(", ")}`);
  }
  return mode;
}
