import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import {
  DEVICE_KINDS,
  defaultDeviceName,
  generateDeviceId,
  isDeviceKind,
  type DeviceKind,
  type LocalDevice,
} from './identity/device.js';
import { MESSAGE_KINDS } from './message/envelope.js';
import { isRecord } from './message/schema.js';
import { DEFAULT_DISCOVERY_PORT, DEFAULT_MULTICAST_GROUP } from './discovery/channel.js';
import { DEFAULT_ANNOUNCE_INTERVAL_MS } from './discovery/engine.js';
import { DEFAULT_MAX_FRAME_BYTES } from './message/codec.js';
import { DEFAULT_RECONNECT_POLICY } from './session/backoff.js';
import { getDefaultTrustStorePath } from './trust/trust-store.js';

export type TransportKind = 'tcp' | 'websocket';

export interface DiscoveryConfig {
  group: string;
  port: number;
  announceIntervalMs: number;
  peerTimeoutMs: number;
}

export interface ReconnectConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export interface SessionConfig {
  connectTimeoutMs: number;
  idleTimeoutMs: number;
  keepaliveIntervalMs: number;
  maxFrameBytes: number;
  reconnect: ReconnectConfig;
}

export interface PairingConfig {
  timeoutMs: number;
  autoAccept: boolean;
}

/**
 * Normalized node configuration; every section is filled in.
 */
export interface LinkConfig {
  device: LocalDevice;
  /** Listening port for sessions */
  port: number;
  transport: TransportKind;
  discovery: DiscoveryConfig;
  session: SessionConfig;
  pairing: PairingConfig;
  trustStorePath: string;
}

export const DEFAULT_PORT = 1716;

/**
 * Default config file path: LANLINK_CONFIG env or ~/.config/lanlink/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.LANLINK_CONFIG) {
    return resolve(process.env.LANLINK_CONFIG);
  }
  return resolve(homedir(), '.config', 'lanlink', 'config.json');
}

function readSection(config: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = config[name];
  if (section === undefined) {
    return {};
  }
  if (!isRecord(section)) {
    throw new Error(`Invalid config: ${name} must be an object`);
  }
  return section;
}

function readNumber(section: Record<string, unknown>, path: string, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid config: ${path}.${key} must be a non-negative number`);
  }
  return value;
}

function readString(section: Record<string, unknown>, path: string, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new Error(`Invalid config: ${path}.${key} must be a string`);
  }
  return value;
}

function readBoolean(section: Record<string, unknown>, path: string, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid config: ${path}.${key} must be a boolean`);
  }
  return value;
}

/**
 * Parse and normalize config from a JSON object (shared by sync and async loaders).
 */
export function parseConfig(config: Record<string, unknown>): LinkConfig {
  const rawDevice = readSection(config, 'device');
  if (typeof rawDevice.id !== 'string' || rawDevice.id === '') {
    throw new Error('Invalid config: missing device.id');
  }

  let kind: DeviceKind = 'desktop';
  if (rawDevice.kind !== undefined) {
    if (!isDeviceKind(rawDevice.kind)) {
      throw new Error(`Invalid config: device.kind must be one of ${DEVICE_KINDS.join(', ')}`);
    }
    kind = rawDevice.kind;
  }

  let capabilities: string[] = [...MESSAGE_KINDS];
  if (rawDevice.capabilities !== undefined) {
    const raw = rawDevice.capabilities;
    const tags = Array.isArray(raw) ? raw.filter((c): c is string => typeof c === 'string') : [];
    if (!Array.isArray(raw) || tags.length !== raw.length) {
      throw new Error('Invalid config: device.capabilities must be an array of strings');
    }
    capabilities = tags;
  }

  const device: LocalDevice = {
    id: rawDevice.id,
    name: readString(rawDevice, 'device', 'name', defaultDeviceName()),
    kind,
    capabilities,
  };

  const port = readNumber(config, 'config', 'port', DEFAULT_PORT);

  const transport = config.transport ?? 'tcp';
  if (transport !== 'tcp' && transport !== 'websocket') {
    throw new Error('Invalid config: transport must be "tcp" or "websocket"');
  }

  const rawDiscovery = readSection(config, 'discovery');
  const announceIntervalMs = readNumber(rawDiscovery, 'discovery', 'announceIntervalMs', DEFAULT_ANNOUNCE_INTERVAL_MS);
  const discovery: DiscoveryConfig = {
    group: readString(rawDiscovery, 'discovery', 'group', DEFAULT_MULTICAST_GROUP),
    port: readNumber(rawDiscovery, 'discovery', 'port', DEFAULT_DISCOVERY_PORT),
    announceIntervalMs,
    peerTimeoutMs: readNumber(rawDiscovery, 'discovery', 'peerTimeoutMs', announceIntervalMs * 3),
  };

  const rawSession = readSection(config, 'session');
  const rawReconnect = readSection(rawSession, 'reconnect');
  const idleTimeoutMs = readNumber(rawSession, 'session', 'idleTimeoutMs', 60000);
  const session: SessionConfig = {
    connectTimeoutMs: readNumber(rawSession, 'session', 'connectTimeoutMs', 10000),
    idleTimeoutMs,
    keepaliveIntervalMs: readNumber(rawSession, 'session', 'keepaliveIntervalMs', Math.floor(idleTimeoutMs / 3)),
    maxFrameBytes: readNumber(rawSession, 'session', 'maxFrameBytes', DEFAULT_MAX_FRAME_BYTES),
    reconnect: {
      initialDelayMs: readNumber(rawReconnect, 'session.reconnect', 'initialDelayMs', DEFAULT_RECONNECT_POLICY.initialDelayMs),
      maxDelayMs: readNumber(rawReconnect, 'session.reconnect', 'maxDelayMs', DEFAULT_RECONNECT_POLICY.maxDelayMs),
      maxAttempts: readNumber(rawReconnect, 'session.reconnect', 'maxAttempts', DEFAULT_RECONNECT_POLICY.maxAttempts),
    },
  };

  const rawPairing = readSection(config, 'pairing');
  const pairing: PairingConfig = {
    timeoutMs: readNumber(rawPairing, 'pairing', 'timeoutMs', 10000),
    autoAccept: readBoolean(rawPairing, 'pairing', 'autoAccept', false),
  };

  return {
    device,
    port,
    transport,
    discovery,
    session,
    pairing,
    trustStorePath: readString(config, 'config', 'trustStorePath', getDefaultTrustStorePath()),
  };
}

function parseJson(content: string, configPath: string): LinkConfig {
  let config: unknown;
  try {
    config = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!isRecord(config)) {
    throw new Error(`Invalid config: ${configPath} must contain a JSON object`);
  }
  return parseConfig(config);
}

/**
 * Load and normalize configuration from a JSON file (sync).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if file doesn't exist or config is invalid
 */
export function loadConfig(path?: string): LinkConfig {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    throw new Error(`Config file not found at ${configPath}. Run 'lanlink init' first.`);
  }

  return parseJson(readFileSync(configPath, 'utf-8'), configPath);
}

/**
 * Load and normalize configuration from a JSON file (async).
 *
 * @param path - Config file path; defaults to getDefaultConfigPath()
 * @throws Error if file doesn't exist or config is invalid
 */
export async function loadConfigAsync(path?: string): Promise<LinkConfig> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new Error(`Config file not found at ${configPath}. Run 'lanlink init' first.`);
    }
    throw err;
  }

  return parseJson(content, configPath);
}

export interface InitConfigOptions {
  name?: string;
  kind?: DeviceKind;
  port?: number;
  trustStorePath?: string;
}

/**
 * Write a fresh config file with a newly generated device id.
 *
 * @throws Error if the file already exists
 */
export function initConfig(path: string, options: InitConfigOptions = {}): LinkConfig {
  if (existsSync(path)) {
    throw new Error(`Config file already exists at ${path}`);
  }

  const document: Record<string, unknown> = {
    device: {
      id: generateDeviceId(),
      name: options.name ?? defaultDeviceName(),
      kind: options.kind ?? 'desktop',
    },
    port: options.port ?? DEFAULT_PORT,
    ...(options.trustStorePath ? { trustStorePath: options.trustStorePath } : {}),
  };

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(document, null, 2) + '\n', 'utf-8');
  return parseConfig(document);
}
