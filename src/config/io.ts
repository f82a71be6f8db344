import fs from "node:fs";

import JSON5 from "json5";

import type { DiagnosticsLogger } from "../diagnostics.js";
import type { Logging } from "../dispatcher.js";
import { buildLogging, type BuildLoggingDeps } from "./build.js";
import type { ConfigRegistry, LoggingConfigSnapshot, ResolvedLoggingConfig } from "./types.js";
import { validateLoggingConfig } from "./validation.js";

export type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

export type LoggingConfigIoDeps = {
  fs?: {
    existsSync: (path: string) => boolean;
    readFileSync: (path: string, encoding: "utf-8") => string;
  };
  json5?: { parse: (value: string) => unknown };
  logger?: DiagnosticsLogger;
};

/** Used when the config file is missing or invalid: ANSI lines on stderr. Fresh on every call. */
export function defaultLoggingConfig(): ResolvedLoggingConfig {
  return {
    backends: [
      {
        sink: { type: "console", stream: "stderr" },
        formatter: { type: "ansi" },
        styled: true,
      },
    ],
  };
}

export function parseLoggingConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
}

export function readLoggingConfigFile(
  configPath: string,
  registry: ConfigRegistry = {},
  deps: LoggingConfigIoDeps = {},
): LoggingConfigSnapshot {
  const io: NonNullable<LoggingConfigIoDeps["fs"]> = deps.fs ?? fs;
  if (!io.existsSync(configPath)) {
    return {
      path: configPath,
      exists: false,
      raw: null,
      valid: true,
      config: defaultLoggingConfig(),
      issues: [],
    };
  }

  let raw: string;
  try {
    raw = io.readFileSync(configPath, "utf-8");
  } catch (err) {
    return {
      path: configPath,
      exists: true,
      raw: null,
      valid: false,
      config: defaultLoggingConfig(),
      issues: [{ path: "", message: `read failed: ${String(err)}` }],
    };
  }

  const parsedRes = parseLoggingConfigJson5(raw, deps.json5);
  if (!parsedRes.ok) {
    return {
      path: configPath,
      exists: true,
      raw,
      valid: false,
      config: defaultLoggingConfig(),
      issues: [{ path: "", message: `JSON5 parse failed: ${parsedRes.error}` }],
    };
  }

  const validated = validateLoggingConfig(parsedRes.parsed, registry);
  if (!validated.ok) {
    return {
      path: configPath,
      exists: true,
      raw,
      valid: false,
      config: defaultLoggingConfig(),
      issues: validated.issues,
    };
  }

  return {
    path: configPath,
    exists: true,
    raw,
    valid: true,
    config: validated.config,
    issues: [],
  };
}

/**
 * Reads the config file and builds a dispatcher from it. Problems with the
 * file are reported through `logger` and the default config is used instead.
 */
export function loadLogging(
  configPath: string,
  registry: ConfigRegistry = {},
  deps: LoggingConfigIoDeps & BuildLoggingDeps = {},
): Logging {
  const logger = deps.logger ?? console;
  const snapshot = readLoggingConfigFile(configPath, registry, deps);
  if (!snapshot.valid) {
    logger.error(`Invalid logging config at ${configPath}:`);
    for (const iss of snapshot.issues) {
      logger.error(`- ${iss.path || "<root>"}: ${iss.message}`);
    }
  }
  return buildLogging(snapshot.config, { ...deps, logger });
}
