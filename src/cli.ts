#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { existsSync, realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getDefaultConfigPath, initConfig, loadConfig, type LinkConfig } from './config.js';
import { MulticastChannel } from './discovery/channel.js';
import { DiscoveryEngine } from './discovery/engine.js';
import type { PeerRecord } from './discovery/peer.js';
import { isDeviceKind, type DeviceKind } from './identity/device.js';
import { createEnvelope, isMessageKind, MESSAGE_KINDS, type AnyEnvelope } from './message/envelope.js';
import { payloadFromWire } from './message/schema.js';
import { createNode, type LinkNode } from './node.js';
import { FileTrustStore } from './trust/trust-store.js';

/**
 * Where command output goes. Defaults to the console.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Resolves when the process is asked to stop (used by `serve`) */
  waitForShutdown?(): Promise<void>;
}

interface CliOptions {
  config?: string;
  pretty: boolean;
}

/**
 * A usage or user error; printed without a stack and exits with status 1.
 */
class CliError extends Error {}

const COMMANDS = 'init, whoami, trusted, forget, discover, pair, send, serve';

/**
 * Get the config file path from CLI options, environment, or default.
 */
function getConfigPath(options: CliOptions): string {
  return options.config ? resolve(options.config) : getDefaultConfigPath();
}

function requireConfig(options: CliOptions): LinkConfig {
  const configPath = getConfigPath(options);
  if (!existsSync(configPath)) {
    throw new CliError('Config file not found. Run `lanlink init` first.');
  }
  return loadConfig(configPath);
}

function parseMs(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const ms = Number(value);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new CliError(`--${name} must be a positive number of milliseconds`);
  }
  return ms;
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Output data as JSON or pretty format.
 */
function output(io: CliIO, data: Record<string, unknown>, pretty: boolean): void {
  if (!pretty) {
    io.out(JSON.stringify(data, null, 2));
    return;
  }
  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      io.out(`${key}:`);
      for (const item of value) {
        if (typeof item === 'object' && item !== null) {
          io.out(`  - ${Object.entries(item).map(([k, v]) => `${k}: ${formatValue(v)}`).join(', ')}`);
        } else {
          io.out(`  - ${formatValue(item)}`);
        }
      }
    } else {
      io.out(`${key}: ${formatValue(value)}`);
    }
  }
}

/**
 * "Name (...last8)", or just "...last8" when the peer has no name.
 * Device ids share the `lanlink-` prefix, so the tail tells them apart.
 */
function peerLabel(name: string | undefined, peerId: string): string {
  const short = `...${peerId.slice(-8)}`;
  if (!name || name.trim() === '') {
    return short;
  }
  return `${name} (${short})`;
}

function describePeer(peer: PeerRecord): Record<string, unknown> {
  return {
    peerId: peer.peerId,
    name: peerLabel(peer.displayName, peer.peerId),
    kind: peer.kind,
    address: `${peer.address}:${peer.port}`,
  };
}

/**
 * Handle the `lanlink init` command.
 */
function handleInit(io: CliIO, options: CliOptions & { name?: string; kind?: string; port?: string }): void {
  const configPath = getConfigPath(options);

  if (existsSync(configPath)) {
    const config = loadConfig(configPath);
    output(io, { status: 'already_initialized', deviceId: config.device.id, configPath }, options.pretty);
    return;
  }

  let kind: DeviceKind | undefined;
  if (options.kind !== undefined) {
    if (!isDeviceKind(options.kind)) {
      throw new CliError('--kind must be one of desktop, laptop, phone, tablet');
    }
    kind = options.kind;
  }

  let port: number | undefined;
  if (options.port !== undefined) {
    port = Number(options.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new CliError('--port must be an integer between 0 and 65535');
    }
  }

  const config = initConfig(configPath, { name: options.name, kind, port });
  output(io, { status: 'initialized', deviceId: config.device.id, name: config.device.name, configPath }, options.pretty);
}

/**
 * Handle the `lanlink whoami` command.
 */
function handleWhoami(io: CliIO, options: CliOptions): void {
  const config = requireConfig(options);
  output(io, {
    deviceId: config.device.id,
    name: config.device.name,
    kind: config.device.kind,
    port: config.port,
    configPath: getConfigPath(options),
  }, options.pretty);
}

/**
 * Handle the `lanlink trusted` command.
 */
async function handleTrusted(io: CliIO, options: CliOptions): Promise<void> {
  const config = requireConfig(options);
  const records = await new FileTrustStore(config.trustStorePath).loadAll();
  output(io, {
    peers: records.map(record => ({
      peerId: record.peerId,
      name: peerLabel(record.displayName, record.peerId),
      pairedAt: new Date(record.pairedAt).toISOString(),
    })),
  }, options.pretty);
}

/**
 * Handle the `lanlink forget <id> | --all` command.
 */
async function handleForget(io: CliIO, args: string[], options: CliOptions & { all: boolean }): Promise<void> {
  const config = requireConfig(options);
  const store = new FileTrustStore(config.trustStorePath);

  if (options.all) {
    const count = (await store.loadAll()).length;
    await store.clearAll();
    output(io, { status: 'cleared', removed: count }, options.pretty);
    return;
  }

  const peerId = args[0];
  if (!peerId) {
    throw new CliError('Missing peer id. Usage: lanlink forget <id> | --all');
  }
  if (!(await store.remove(peerId))) {
    throw new CliError(`Peer ${peerId} is not trusted`);
  }
  output(io, { status: 'forgotten', peerId }, options.pretty);
}

/**
 * Handle the `lanlink discover` command: browse for `--timeout` ms and list what answered.
 */
async function handleDiscover(io: CliIO, options: CliOptions & { timeout?: string }): Promise<void> {
  const config = requireConfig(options);
  const timeoutMs = parseMs(options.timeout, 'timeout', 5000);

  const engine = new DiscoveryEngine({
    channel: new MulticastChannel({ group: config.discovery.group, port: config.discovery.port }),
    localId: config.device.id,
    announceIntervalMs: config.discovery.announceIntervalMs,
    peerTimeoutMs: config.discovery.peerTimeoutMs,
  });

  await engine.browse();
  await new Promise(resolve => setTimeout(resolve, timeoutMs));
  const peers = engine.listPeers();
  await engine.close();

  output(io, { peers: peers.map(describePeer) }, options.pretty);
}

function waitForPeer(node: LinkNode, peerId: string, timeoutMs: number): Promise<boolean> {
  if (node.knownPeers().some(peer => peer.peerId === peerId)) {
    return Promise.resolve(true);
  }
  return new Promise((resolvePeer) => {
    const timer = setTimeout(() => {
      node.off('discovery', onDiscovery);
      resolvePeer(false);
    }, timeoutMs);
    const onDiscovery = (): void => {
      if (node.knownPeers().some(peer => peer.peerId === peerId)) {
        clearTimeout(timer);
        node.off('discovery', onDiscovery);
        resolvePeer(true);
      }
    };
    node.on('discovery', onDiscovery);
  });
}

/**
 * Handle the `lanlink pair <id> [--code]` command.
 */
async function handlePair(io: CliIO, args: string[], options: CliOptions & { code?: string; timeout?: string }): Promise<void> {
  const peerId = args[0];
  if (!peerId) {
    throw new CliError('Missing peer id. Usage: lanlink pair <id> [--code <code>]');
  }
  const config = requireConfig(options);
  const timeoutMs = parseMs(options.timeout, 'timeout', 10000);

  const node = createNode(config);
  await node.start();
  try {
    if (!(await waitForPeer(node, peerId, timeoutMs))) {
      throw new CliError(`Peer ${peerId} was not discovered within ${timeoutMs}ms`);
    }
    const result = await node.pair(peerId, options.code);
    if (!result.ok) {
      throw new CliError(result.error.message);
    }
    output(io, {
      status: 'paired',
      peerId: result.record.peerId,
      name: peerLabel(result.record.displayName, result.record.peerId),
    }, options.pretty);
  } finally {
    await node.stop();
  }
}

function waitForConnected(node: LinkNode, peerId: string, timeoutMs: number): Promise<boolean> {
  if (node.sessionState(peerId) === 'connected') {
    return Promise.resolve(true);
  }
  return new Promise((resolveConnected) => {
    const timer = setTimeout(() => {
      node.off('state-changed', onState);
      resolveConnected(false);
    }, timeoutMs);
    const onState = (changed: string, state: string): void => {
      if (changed === peerId && state === 'connected') {
        clearTimeout(timer);
        node.off('state-changed', onState);
        resolveConnected(true);
      }
    };
    node.on('state-changed', onState);
  });
}

/**
 * Build the envelope for `lanlink send` from its kind and `--payload` JSON.
 */
function parseEnvelope(kind: string, payload: string | undefined): AnyEnvelope {
  if (!isMessageKind(kind)) {
    throw new CliError(`Unknown message kind '${kind}'. Use one of: ${MESSAGE_KINDS.join(', ')}`);
  }
  let wire: unknown;
  try {
    wire = JSON.parse(payload ?? '{}');
  } catch {
    throw new CliError('--payload must be valid JSON');
  }
  try {
    return createEnvelope(kind, payloadFromWire(kind, wire));
  } catch (e) {
    throw new CliError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Handle the `lanlink send <id> <kind> [--payload]` command: connect to a
 * paired peer and deliver one envelope.
 */
async function handleSend(io: CliIO, args: string[], options: CliOptions & { payload?: string; timeout?: string }): Promise<void> {
  const [peerId, kind] = args;
  if (!peerId || !kind) {
    throw new CliError('Missing peer id or kind. Usage: lanlink send <id> <kind> [--payload <json>]');
  }
  const envelope = parseEnvelope(kind, options.payload);
  const config = requireConfig(options);
  const timeoutMs = parseMs(options.timeout, 'timeout', 10000);

  const node = createNode(config);
  await node.start();
  try {
    if (!(await node.listTrusted()).some(record => record.peerId === peerId)) {
      throw new CliError(`Peer ${peerId} is not paired. Run \`lanlink pair ${peerId}\` first.`);
    }
    if (!(await waitForPeer(node, peerId, timeoutMs))) {
      throw new CliError(`Peer ${peerId} was not discovered within ${timeoutMs}ms`);
    }
    await node.connect(peerId);
    if (!(await waitForConnected(node, peerId, timeoutMs))) {
      throw new CliError(`Could not connect to ${peerId} within ${timeoutMs}ms`);
    }
    const result = await node.send(peerId, envelope);
    if (!result.ok) {
      throw new CliError(result.error.message);
    }
    output(io, { status: 'sent', peerId, kind: envelope.kind }, options.pretty);
  } finally {
    await node.stop();
  }
}

/**
 * Handle the `lanlink serve` command: run a node until interrupted.
 */
async function handleServe(io: CliIO, options: CliOptions): Promise<void> {
  const config = requireConfig(options);
  const node = createNode(config);

  node.on('discovery', (event) => {
    if (event.type === 'peer-disappeared') {
      io.out(`- ${event.peerId}`);
    } else if (event.type === 'peer-appeared') {
      io.out(`+ ${peerLabel(event.peer.displayName, event.peer.peerId)} at ${event.peer.address}:${event.peer.port}`);
    }
  });
  node.on('state-changed', (peerId, state) => {
    io.out(`${peerId}: ${state}`);
  });
  node.on('paired', (record) => {
    io.out(`paired with ${peerLabel(record.displayName, record.peerId)}; new code ${node.pairingCode()}`);
  });

  await node.start();
  output(io, {
    status: 'serving',
    deviceId: config.device.id,
    port: node.listeningPort(),
    pairingCode: node.pairingCode(),
  }, options.pretty);

  await (io.waitForShutdown ? io.waitForShutdown() : waitForSignal());
  await node.stop();
}

function waitForSignal(): Promise<void> {
  return new Promise((resolveSignal) => {
    const onSignal = (): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolveSignal();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Run one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
  if (args.length === 0) {
    io.err('Usage: lanlink <command> [options]');
    io.err(`Commands: ${COMMANDS}`);
    return 1;
  }

  let parsed;
  try {
    parsed = parseArgs({
      args,
      options: {
        config: { type: 'string' },
        pretty: { type: 'boolean' },
        name: { type: 'string' },
        kind: { type: 'string' },
        port: { type: 'string' },
        timeout: { type: 'string' },
        code: { type: 'string' },
        all: { type: 'boolean' },
        payload: { type: 'string' },
      },
      allowPositionals: true,
    });
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  const options: CliOptions = { config: values.config, pretty: values.pretty ?? false };

  try {
    switch (command) {
      case 'init':
        handleInit(io, { ...options, name: values.name, kind: values.kind, port: values.port });
        break;
      case 'whoami':
        handleWhoami(io, options);
        break;
      case 'trusted':
        await handleTrusted(io, options);
        break;
      case 'forget':
        await handleForget(io, rest, { ...options, all: values.all ?? false });
        break;
      case 'discover':
        await handleDiscover(io, { ...options, timeout: values.timeout });
        break;
      case 'pair':
        await handlePair(io, rest, { ...options, code: values.code, timeout: values.timeout });
        break;
      case 'send':
        await handleSend(io, rest, { ...options, payload: values.payload, timeout: values.timeout });
        break;
      case 'serve':
        await handleServe(io, options);
        break;
      default:
        io.err(`Error: Unknown command '${command}'. Use: ${COMMANDS}`);
        return 1;
    }
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error('Fatal error:', e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    },
  );
}
