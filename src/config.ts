import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import type { Logger } from 'pino';
import { z } from 'zod/v4';

export const CONFIG_FILE_NAME = 'config.json';
export const ENV_PREFIX = 'HOMESEER_';

export interface HubConfig {
  readonly url: string;
  readonly username?: string;
  readonly password?: string;
  readonly token?: string;
  readonly source: string;
  /** Per-request timeout in seconds. */
  readonly timeout: number;
  readonly verifyTls: boolean;
}

type ConfigLayer = { -readonly [K in keyof HubConfig]?: HubConfig[K] };

export type AuthScheme = 'token' | 'user_pass' | 'none';

export interface ConfigIssue {
  kind: 'CONFIG_DEGRADED';
  layer: 'file' | 'env';
  key?: string;
  message: string;
}

export interface ServerOptions {
  logLevel: string;
  logPretty: boolean;
}

export const DEFAULT_HUB_CONFIG: HubConfig = Object.freeze({
  url: 'https://connected2.homeseer.com/json',
  source: 'homeseer-mcp',
  timeout: 30,
  verifyTls: true
});

const TRUTHY_VALUES = new Set(['true', '1', 'yes', 'on']);

const fileLayerSchema = z
  .object({
    url: z.string().min(1),
    username: z.string(),
    password: z.string(),
    token: z.string(),
    source: z.string().min(1),
    timeout: z.number().int().positive(),
    verify_ssl: z.boolean()
  })
  .partial();

type FileLayer = z.infer<typeof fileLayerSchema>;

const envSchema = z.object({
  HOMESEER_URL: z.string().optional(),
  HOMESEER_USERNAME: z.string().optional(),
  HOMESEER_PASSWORD: z.string().optional(),
  HOMESEER_TOKEN: z.string().optional(),
  HOMESEER_SOURCE: z.string().optional(),
  HOMESEER_TIMEOUT: z.string().optional(),
  HOMESEER_VERIFY_SSL: z.string().optional()
});

const serverEnvSchema = z.object({
  MCP_LOG_LEVEL: z.string().optional(),
  MCP_LOG_PRETTY: z.string().optional()
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseFlag(raw: string): boolean {
  return TRUTHY_VALUES.has(raw.trim().toLowerCase());
}

export function parseTimeout(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) && value > 0 ? value : undefined;
}

export function createHubConfig(layer: ConfigLayer = {}): HubConfig {
  return Object.freeze({ ...DEFAULT_HUB_CONFIG, ...layer });
}

export function baseUrl(config: HubConfig): string {
  return config.url.replace(/\/+$/, '');
}

export function authScheme(config: HubConfig): AuthScheme {
  if (config.token) {
    return 'token';
  }
  if (config.username && config.password) {
    return 'user_pass';
  }
  return 'none';
}

export function authParams(config: HubConfig): Record<string, string> {
  // Token wins even when a username/password pair is also configured.
  if (config.token) {
    return { token: config.token };
  }
  if (config.username && config.password) {
    return { user: config.username, pass: config.password };
  }
  return {};
}

/**
 * Query parameters for one hub request: `source`, then the auth scheme, then the
 * operation's own parameters.
 */
export function requestParams(
  config: HubConfig,
  params: Record<string, string | number> = {}
): Record<string, string | number> {
  return {
    source: config.source,
    ...authParams(config),
    ...params
  };
}

export function defaultSearchDirs(): string[] {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  return [process.cwd(), moduleDir, dirname(moduleDir)];
}

export function findConfigFile(dirs: string[]): string | undefined {
  for (const dir of dirs) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function decodeFileLayer(payload: unknown, issues: ConfigIssue[]): ConfigLayer {
  if (!isRecord(payload)) {
    issues.push({ kind: 'CONFIG_DEGRADED', layer: 'file', message: 'Config file is not a JSON object' });
    return {};
  }

  const candidate: Record<string, unknown> = { ...payload };
  let decoded = fileLayerSchema.safeParse(candidate);
  if (!decoded.success) {
    for (const issue of decoded.error.issues) {
      const key = issue.path[0];
      if (typeof key !== 'string') {
        continue;
      }
      delete candidate[key];
      issues.push({ kind: 'CONFIG_DEGRADED', layer: 'file', key, message: `Ignoring ${key}: ${issue.message}` });
    }
    decoded = fileLayerSchema.safeParse(candidate);
  }

  const data: FileLayer = decoded.success ? decoded.data : {};
  const layer: ConfigLayer = {};
  if (data.url !== undefined) layer.url = data.url;
  if (data.username !== undefined) layer.username = data.username;
  if (data.password !== undefined) layer.password = data.password;
  if (data.token !== undefined) layer.token = data.token;
  if (data.source !== undefined) layer.source = data.source;
  if (data.timeout !== undefined) layer.timeout = data.timeout;
  if (data.verify_ssl !== undefined) layer.verifyTls = data.verify_ssl;
  return layer;
}

function readFileLayer(path: string, issues: ConfigIssue[]): ConfigLayer {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    issues.push({ kind: 'CONFIG_DEGRADED', layer: 'file', message: `Error reading config file ${path}: ${message}` });
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    issues.push({ kind: 'CONFIG_DEGRADED', layer: 'file', message: `Invalid JSON in config file ${path}: ${message}` });
    return {};
  }

  return decodeFileLayer(parsed, issues);
}

function readEnvLayer(env: NodeJS.ProcessEnv, issues: ConfigIssue[]): ConfigLayer {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    issues.push({ kind: 'CONFIG_DEGRADED', layer: 'env', message: parsed.error.message });
    return {};
  }

  const vars = parsed.data;
  const layer: ConfigLayer = {};

  const url = parseOptionalString(vars.HOMESEER_URL);
  if (url) layer.url = url;
  const username = parseOptionalString(vars.HOMESEER_USERNAME);
  if (username) layer.username = username;
  const password = parseOptionalString(vars.HOMESEER_PASSWORD);
  if (password) layer.password = password;
  const token = parseOptionalString(vars.HOMESEER_TOKEN);
  if (token) layer.token = token;
  const source = parseOptionalString(vars.HOMESEER_SOURCE);
  if (source) layer.source = source;

  const timeoutRaw = parseOptionalString(vars.HOMESEER_TIMEOUT);
  if (timeoutRaw) {
    const timeout = parseTimeout(timeoutRaw);
    if (timeout === undefined) {
      issues.push({
        kind: 'CONFIG_DEGRADED',
        layer: 'env',
        key: `${ENV_PREFIX}TIMEOUT`,
        message: `Invalid timeout value in ${ENV_PREFIX}TIMEOUT: ${timeoutRaw}`
      });
    } else {
      layer.timeout = timeout;
    }
  }

  const verifyRaw = parseOptionalString(vars.HOMESEER_VERIFY_SSL);
  if (verifyRaw) {
    layer.verifyTls = parseFlag(verifyRaw);
  }

  return layer;
}

export interface ResolveHubConfigOptions {
  logger: Logger;
  /** Skips the directory search when set. */
  configPath?: string;
  searchDirs?: string[];
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedHubConfig {
  config: HubConfig;
  configPath?: string;
  issues: ConfigIssue[];
}

export function loadHubConfig(options: ResolveHubConfigOptions): ResolvedHubConfig {
  const { logger } = options;
  const issues: ConfigIssue[] = [];

  const configPath = options.configPath ?? findConfigFile(options.searchDirs ?? defaultSearchDirs());
  let fileLayer: ConfigLayer = {};
  if (configPath) {
    fileLayer = readFileLayer(configPath, issues);
  } else {
    logger.info({ file: CONFIG_FILE_NAME }, 'Config file not found, using defaults');
  }

  const envLayer = readEnvLayer(options.env ?? process.env, issues);
  const config = createHubConfig({ ...fileLayer, ...envLayer });

  for (const issue of issues) {
    logger.warn({ layer: issue.layer, key: issue.key }, issue.message);
  }

  const scheme = authScheme(config);
  logger.info(
    {
      url: config.url,
      source: config.source,
      timeout: config.timeout,
      verifyTls: config.verifyTls,
      auth: scheme,
      configPath
    },
    'HomeSeer configuration loaded'
  );
  if (scheme === 'none') {
    logger.warn('No HomeSeer authentication configured');
  }

  return { config, configPath, issues };
}

export function resolveHubConfig(options: ResolveHubConfigOptions): HubConfig {
  return loadHubConfig(options).config;
}

/** Caches the first resolved record until {@link ConfigResolver.reload} is called. */
export class ConfigResolver {
  private cached: HubConfig | undefined;

  constructor(private readonly options: ResolveHubConfigOptions) {}

  get(): HubConfig {
    if (!this.cached) {
      this.cached = resolveHubConfig(this.options);
    }
    return this.cached;
  }

  reload(): HubConfig {
    this.cached = resolveHubConfig(this.options);
    return this.cached;
  }
}

export function loadServerOptions(env: NodeJS.ProcessEnv = process.env): ServerOptions {
  const parsed = serverEnvSchema.safeParse(env);
  const vars = parsed.success ? parsed.data : {};
  return {
    logLevel: parseOptionalString(vars.MCP_LOG_LEVEL) ?? 'info',
    logPretty: vars.MCP_LOG_PRETTY ? parseFlag(vars.MCP_LOG_PRETTY) : false
  };
}
