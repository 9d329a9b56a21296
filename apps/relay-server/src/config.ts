import path from "node:path";
import { fileURLToPath } from "node:url";
import { isLogLevel, type LogLevel } from "./log.js";

const DEFAULT_PAGES_DIR = fileURLToPath(new URL("../public", import.meta.url));

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface RelayConfig {
  httpHost: string;
  httpPort: number;
  socketHost: string;
  socketPort: number;
  /** Largest payload the listener reads from one connection */
  socketBufferSize: number;
  mongoUri: string;
  /** Server selection timeout for the startup health check */
  mongoTimeoutMs: number;
  dbName: string;
  collectionName: string;
  /** Directory holding index.html, message.html and error.html */
  pagesDir: string;
  /** Root that /static/* is served from */
  staticDir: string;
  logLevel: LogLevel;
}

function parseInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function parsePort(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const port = parseInteger(name, raw);
  if (port > 65535) {
    throw new ConfigError(`${name} must be between 0 and 65535, got ${port}`);
  }
  return port;
}

function parsePositive(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = parseInteger(name, raw);
  if (value === 0) {
    throw new ConfigError(`${name} must be greater than 0`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === "") return "info";
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`LOG_LEVEL "${raw}" is not one of debug, info, warn, error, silent`);
  }
  return level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const pagesDir = path.resolve(env.PAGES_DIR || DEFAULT_PAGES_DIR);
  return {
    httpHost: env.HTTP_HOST || "0.0.0.0",
    httpPort: parsePort("HTTP_PORT", env.HTTP_PORT, 3000),
    socketHost: env.SOCKET_HOST || "127.0.0.1",
    socketPort: parsePort("SOCKET_PORT", env.SOCKET_PORT, 5000),
    socketBufferSize: parsePositive("SOCKET_BUFFER_SIZE", env.SOCKET_BUFFER_SIZE, 1024),
    mongoUri: env.MONGO_URI || "mongodb://localhost:27017",
    mongoTimeoutMs: parsePositive("MONGO_TIMEOUT_MS", env.MONGO_TIMEOUT_MS, 5000),
    dbName: env.DB_NAME || "relay",
    collectionName: env.COLLECTION_NAME || "messages",
    pagesDir,
    staticDir: path.resolve(env.STATIC_DIR || path.join(pagesDir, "static")),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

const config: RelayConfig = loadConfig();

export default config;
