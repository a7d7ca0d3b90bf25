import fs from "node:fs";
import path from "node:path";
import { DEFAULT_UDP_PORT, DEFAULT_WS_PORT, PACKET_KINDS, isPacketKind } from "@pitlog/shared/constants";
import type { PacketKind } from "@pitlog/shared/types";

export interface CollectorConfig {
  url: string;
  token: string;
  batchSize: number;
  flushIntervalMs: number;
  /** A post still unanswered after this long is aborted and its batch dropped. */
  requestTimeoutMs: number;
  /** Prefix of each event's sourcetype; the packet kind is appended. */
  sourcetype: string;
}

export interface AppConfig {
  udpHost: string;
  udpPort: number;
  /** 0 disables the live feed */
  wsPort: number;
  recordSessions: boolean;
  packetKinds: PacketKind[];
  statsIntervalMs: number;
  /** null when no collector URL is configured */
  collector: CollectorConfig | null;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_CONFIG: AppConfig = {
  udpHost: "0.0.0.0",
  udpPort: DEFAULT_UDP_PORT,
  wsPort: DEFAULT_WS_PORT,
  recordSessions: true,
  packetKinds: [...PACKET_KINDS],
  statsIntervalMs: 10_000,
  collector: null,
};

const DEFAULT_COLLECTOR: Omit<CollectorConfig, "url"> = {
  token: "",
  batchSize: 50,
  flushIntervalMs: 1_000,
  requestTimeoutMs: 10_000,
  sourcetype: "f1:telemetry",
};

// ── Validation ──────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const ensureString = (value: unknown, key: string): string => {
  if (typeof value !== "string") throw new ConfigError(`${key} must be a string`);
  return value;
};

const ensureBoolean = (value: unknown, key: string): boolean => {
  if (typeof value !== "boolean") throw new ConfigError(`${key} must be a boolean`);
  return value;
};

const ensureInteger = (value: unknown, key: string, min: number, max: number): number => {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${key} must be an integer between ${min} and ${max}`);
  }
  return value;
};

const ensurePort = (value: unknown, key: string): number => ensureInteger(value, key, 0, 65535);

const ensurePacketKinds = (value: unknown, key: string): PacketKind[] => {
  if (!Array.isArray(value)) throw new ConfigError(`${key} must be an array`);
  return value.map((item, i) => {
    const kind = ensureString(item, `${key}[${i}]`);
    if (!isPacketKind(kind)) throw new ConfigError(`${key}[${i}] is not a packet kind: ${kind}`);
    return kind;
  });
};

function parseCollector(value: unknown, key: string): CollectorConfig | null {
  if (value === null || value === undefined) return null;
  if (!isRecord(value)) throw new ConfigError(`${key} must be an object`);
  if (value.url === undefined) return null;
  return {
    url: ensureString(value.url, `${key}.url`),
    token: value.token === undefined ? DEFAULT_COLLECTOR.token : ensureString(value.token, `${key}.token`),
    batchSize:
      value.batchSize === undefined
        ? DEFAULT_COLLECTOR.batchSize
        : ensureInteger(value.batchSize, `${key}.batchSize`, 1, 10_000),
    flushIntervalMs:
      value.flushIntervalMs === undefined
        ? DEFAULT_COLLECTOR.flushIntervalMs
        : ensureInteger(value.flushIntervalMs, `${key}.flushIntervalMs`, 10, 600_000),
    requestTimeoutMs:
      value.requestTimeoutMs === undefined
        ? DEFAULT_COLLECTOR.requestTimeoutMs
        : ensureInteger(value.requestTimeoutMs, `${key}.requestTimeoutMs`, 100, 600_000),
    sourcetype:
      value.sourcetype === undefined
        ? DEFAULT_COLLECTOR.sourcetype
        : ensureString(value.sourcetype, `${key}.sourcetype`),
  };
}

/** Validates a parsed config file; missing keys take their defaults. */
export function parseConfig(raw: unknown): AppConfig {
  if (!isRecord(raw)) throw new ConfigError("config must be an object");
  const d = DEFAULT_CONFIG;
  return {
    udpHost: raw.udpHost === undefined ? d.udpHost : ensureString(raw.udpHost, "udpHost"),
    udpPort: raw.udpPort === undefined ? d.udpPort : ensurePort(raw.udpPort, "udpPort"),
    wsPort: raw.wsPort === undefined ? d.wsPort : ensurePort(raw.wsPort, "wsPort"),
    recordSessions:
      raw.recordSessions === undefined ? d.recordSessions : ensureBoolean(raw.recordSessions, "recordSessions"),
    packetKinds:
      raw.packetKinds === undefined ? [...d.packetKinds] : ensurePacketKinds(raw.packetKinds, "packetKinds"),
    statsIntervalMs:
      raw.statsIntervalMs === undefined
        ? d.statsIntervalMs
        : ensureInteger(raw.statsIntervalMs, "statsIntervalMs", 0, 3_600_000),
    collector: parseCollector(raw.collector, "collector"),
  };
}

// ── Environment overrides ───────────────────────────────────────

function parseEnvPort(value: string, key: string): number {
  if (!/^\d+$/.test(value.trim())) throw new ConfigError(`${key} must be an integer, got "${value}"`);
  return ensurePort(Number(value), key);
}

/** Environment variables override the file. */
export function applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const next: AppConfig = { ...config };

  if (env.PITLOG_UDP_HOST) next.udpHost = env.PITLOG_UDP_HOST;
  if (env.PITLOG_UDP_PORT) next.udpPort = parseEnvPort(env.PITLOG_UDP_PORT, "PITLOG_UDP_PORT");
  if (env.PITLOG_WS_PORT) next.wsPort = parseEnvPort(env.PITLOG_WS_PORT, "PITLOG_WS_PORT");
  if (env.PITLOG_RECORD) next.recordSessions = env.PITLOG_RECORD !== "0" && env.PITLOG_RECORD !== "false";
  if (env.PITLOG_PACKET_KINDS) {
    next.packetKinds = ensurePacketKinds(
      env.PITLOG_PACKET_KINDS.split(",").map((kind) => kind.trim()).filter(Boolean),
      "PITLOG_PACKET_KINDS",
    );
  }

  if (env.PITLOG_COLLECTOR_URL) {
    next.collector = { ...DEFAULT_COLLECTOR, ...next.collector, url: env.PITLOG_COLLECTOR_URL };
  }
  if (env.PITLOG_COLLECTOR_TOKEN && next.collector) {
    next.collector = { ...next.collector, token: env.PITLOG_COLLECTOR_TOKEN };
  }

  return next;
}

// ── Process-wide config ─────────────────────────────────────────

let current: AppConfig = DEFAULT_CONFIG;

function load(configPath: string): AppConfig {
  if (!fs.existsSync(configPath)) return DEFAULT_CONFIG;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${configPath} is not valid JSON: ${message}`);
  }
  return parseConfig(raw);
}

export function initConfig(dataDir: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  fs.mkdirSync(dataDir, { recursive: true });
  current = applyEnv(load(path.join(dataDir, "config.json")), env);
  return current;
}

export function getConfig(): AppConfig {
  return current;
}
