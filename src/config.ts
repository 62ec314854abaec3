import fs from "fs";
import path from "path";

import { z } from "zod";

import { describeError } from "./errors.js";

export interface ReconnectPolicy {
  initialDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Failed attempts in a row before a session gives up and reports `error`. */
  maxAttempts: number;
}

export interface BackendConfig {
  host: string;
  port: number;
  dataPath: string;
  devicesPath: string;
  certsPath: string;
  profilesPath: string;
  auditLogPath: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  reconnect: ReconnectPolicy;
  errorRetryMs: number;
  commandQueueLimit: number;
  castPositionThresholdSec: number;
}

const packageRoot = path.resolve(__dirname, "..");

function resolveDataPath(...segments: string[]): string {
  return path.join(packageRoot, "data", ...segments);
}

const configFileSchema = z
  .object({
    host: z.string(),
    port: z.number().int().positive(),
    dataPath: z.string(),
    devicesPath: z.string(),
    certsPath: z.string(),
    profilesPath: z.string(),
    auditLogPath: z.string(),
    connectTimeoutMs: z.number().positive(),
    commandTimeoutMs: z.number().positive(),
    reconnect: z
      .object({
        initialDelayMs: z.number().positive(),
        factor: z.number().min(1),
        maxDelayMs: z.number().positive(),
        maxAttempts: z.number().int().positive()
      })
      .partial(),
    errorRetryMs: z.number().positive(),
    commandQueueLimit: z.number().int().positive(),
    castPositionThresholdSec: z.number().nonnegative()
  })
  .partial();

export type ConfigFile = z.infer<typeof configFileSchema>;

function readConfigFile(): ConfigFile | undefined {
  const explicit = process.env.ATV_BRIDGE_CONFIG;
  const candidate = explicit ?? path.resolve(process.cwd(), "config.json");
  if (!fs.existsSync(candidate)) {
    return undefined;
  }
  try {
    const raw = fs.readFileSync(candidate, "utf-8");
    const parsed = configFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      console.warn(`[config] Ignoring ${candidate}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  } catch (error) {
    console.warn(`[config] Failed to parse ${candidate}: ${describeError(error)}`);
    return undefined;
  }
}

type PathKeys = "dataPath" | "devicesPath" | "certsPath" | "auditLogPath";

const defaults: Omit<BackendConfig, PathKeys> = {
  host: "127.0.0.1",
  port: 48100,
  profilesPath: resolveDataPath("profiles"),
  connectTimeoutMs: 10_000,
  commandTimeoutMs: 5_000,
  reconnect: {
    initialDelayMs: 500,
    factor: 1.5,
    maxDelayMs: 30_000,
    maxAttempts: 20
  },
  errorRetryMs: 60_000,
  commandQueueLimit: 16,
  castPositionThresholdSec: 30
};

/** Stored state lives under `dataPath` unless a file location is set on its own. */
export function resolveConfig(fileConfig: ConfigFile, dataHome = process.env.ATV_BRIDGE_DATA_HOME ?? "./state"): BackendConfig {
  const dataPath = path.resolve(fileConfig.dataPath ?? dataHome);
  return {
    ...defaults,
    ...fileConfig,
    dataPath,
    devicesPath: fileConfig.devicesPath ?? path.join(dataPath, "devices.json"),
    certsPath: fileConfig.certsPath ?? path.join(dataPath, "certs"),
    auditLogPath: fileConfig.auditLogPath ?? path.join(dataPath, "logs", "commands.jsonl"),
    reconnect: {
      ...defaults.reconnect,
      ...fileConfig.reconnect
    }
  };
}

export const config: BackendConfig = resolveConfig(readConfigFile() ?? {});

export const paths = {
  packageRoot,
  resolveDataPath
};
