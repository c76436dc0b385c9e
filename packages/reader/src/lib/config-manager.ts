/**
 * Configuration Manager for the reader
 * Loads ~/.felica-remote/config.json and applies environment overrides.
 *
 * Environment: AUTH_SERVER_URL, FELICA_HTTP_TIMEOUT_MS,
 * FELICA_EXCHANGE_TIMEOUT_MS, FELICA_LOG_LEVEL
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

import { FelicaError, isLogLevel, type LogLevel } from "@felica-remote/shared";

import { DEFAULT_ENDPOINTS, normalizeBaseUrl, type RelayEndpoints } from "./relay-client.js";

export const CONTRACT_VERSION = 1;

export interface ReaderConfig {
  authServerUrl: string;
  httpTimeoutMs: number;
  exchangeTimeoutMs: number;
  contractVersion: number;
  endpoints: RelayEndpoints;
  logLevel: LogLevel;
}

/** Public authentication server for transit cards */
export const DEFAULT_AUTH_SERVER_URL = "https://felica-auth.nyaa.ws";

export const DEFAULT_CONFIG: ReaderConfig = {
  authServerUrl: DEFAULT_AUTH_SERVER_URL,
  httpTimeoutMs: 10_000,
  exchangeTimeoutMs: 1_000,
  contractVersion: CONTRACT_VERSION,
  endpoints: DEFAULT_ENDPOINTS,
  logLevel: "info",
};

const CONFIG_DIR = join(homedir(), ".felica-remote");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(message: string): FelicaError {
  return new FelicaError("InvalidParameter", `Invalid config: ${message}`);
}

function serverUrl(value: unknown, source: string): string {
  if (typeof value !== "string") {
    throw invalid(`${source} must be a string`);
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw invalid(`${source} is not a URL: ${value}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalid(`${source} must use http or https: ${value}`);
  }
  return normalizeBaseUrl(value);
}

function timeout(value: unknown, source: string): number {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed <= 0) {
    throw invalid(`${source} must be a positive integer (ms)`);
  }
  return parsed;
}

function endpointPath(value: unknown, source: string): string {
  if (typeof value !== "string" || !value.startsWith("/")) {
    throw invalid(`${source} must be a path starting with "/"`);
  }
  return value;
}

/**
 * Manages the reader configuration file
 */
export class ConfigManager {
  private config: ReaderConfig | null = null;

  constructor(
    private configPath: string = CONFIG_FILE,
    private env: Env = process.env,
  ) {}

  getPath(): string {
    return this.configPath;
  }

  /**
   * Load the file (defaults when it does not exist) and apply the environment
   */
  load(): ReaderConfig {
    if (this.config) {
      return this.config;
    }
    const fromFile = existsSync(this.configPath) ? this.readFile() : DEFAULT_CONFIG;
    this.config = this.applyEnv(fromFile);
    return this.config;
  }

  /**
   * Persist the server URL, keeping the rest of the file
   */
  updateAuthServerUrl(url: string): ReaderConfig {
    const current = existsSync(this.configPath) ? this.readFile() : DEFAULT_CONFIG;
    const next: ReaderConfig = { ...current, authServerUrl: serverUrl(url, "authServerUrl") };
    this.save(next);
    this.config = null;
    return this.load();
  }

  private readFile(): ReaderConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, "utf8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FelicaError(
        "InvalidParameter",
        `Failed to load config from ${this.configPath}: ${reason}`,
        { cause: error },
      );
    }
    return this.validate(raw);
  }

  private validate(raw: unknown): ReaderConfig {
    if (!isRecord(raw)) {
      throw invalid("top level must be an object");
    }
    const contractVersion = raw.contractVersion ?? CONTRACT_VERSION;
    if (contractVersion !== CONTRACT_VERSION) {
      throw invalid(`unsupported contractVersion ${JSON.stringify(contractVersion)}`);
    }
    const endpoints = raw.endpoints ?? {};
    if (!isRecord(endpoints)) {
      throw invalid("endpoints must be an object");
    }
    const logLevel = raw.logLevel ?? DEFAULT_CONFIG.logLevel;
    if (!isLogLevel(logLevel)) {
      throw invalid(`unknown logLevel ${JSON.stringify(logLevel)}`);
    }
    return {
      authServerUrl: serverUrl(raw.authServerUrl ?? DEFAULT_CONFIG.authServerUrl, "authServerUrl"),
      httpTimeoutMs: timeout(raw.httpTimeoutMs ?? DEFAULT_CONFIG.httpTimeoutMs, "httpTimeoutMs"),
      exchangeTimeoutMs: timeout(
        raw.exchangeTimeoutMs ?? DEFAULT_CONFIG.exchangeTimeoutMs,
        "exchangeTimeoutMs",
      ),
      contractVersion: CONTRACT_VERSION,
      endpoints: {
        mutualAuthentication: endpointPath(
          endpoints.mutualAuthentication ?? DEFAULT_ENDPOINTS.mutualAuthentication,
          "endpoints.mutualAuthentication",
        ),
        encryptionExchange: endpointPath(
          endpoints.encryptionExchange ?? DEFAULT_ENDPOINTS.encryptionExchange,
          "endpoints.encryptionExchange",
        ),
      },
      logLevel,
    };
  }

  private applyEnv(config: ReaderConfig): ReaderConfig {
    const { AUTH_SERVER_URL, FELICA_HTTP_TIMEOUT_MS, FELICA_EXCHANGE_TIMEOUT_MS, FELICA_LOG_LEVEL } =
      this.env;
    if (FELICA_LOG_LEVEL !== undefined && !isLogLevel(FELICA_LOG_LEVEL)) {
      throw invalid(`unknown FELICA_LOG_LEVEL ${FELICA_LOG_LEVEL}`);
    }
    return {
      ...config,
      authServerUrl:
        AUTH_SERVER_URL !== undefined
          ? serverUrl(AUTH_SERVER_URL, "AUTH_SERVER_URL")
          : config.authServerUrl,
      httpTimeoutMs:
        FELICA_HTTP_TIMEOUT_MS !== undefined
          ? timeout(FELICA_HTTP_TIMEOUT_MS, "FELICA_HTTP_TIMEOUT_MS")
          : config.httpTimeoutMs,
      exchangeTimeoutMs:
        FELICA_EXCHANGE_TIMEOUT_MS !== undefined
          ? timeout(FELICA_EXCHANGE_TIMEOUT_MS, "FELICA_EXCHANGE_TIMEOUT_MS")
          : config.exchangeTimeoutMs,
      logLevel: FELICA_LOG_LEVEL ?? config.logLevel,
    };
  }

  private save(config: ReaderConfig): void {
    const dir = dirname(this.configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    try {
      writeFileSync(this.configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FelicaError(
        "InvalidParameter",
        `Failed to save config to ${this.configPath}: ${reason}`,
        { cause: error },
      );
    }
  }
}
