import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';
import { UnknownPeerError } from './errors.js';
import type { LinkConfig } from './config.js';
import { MulticastChannel, type AnnouncementChannel } from './discovery/channel.js';
import { DiscoveryEngine, type DiscoveryStream } from './discovery/engine.js';
import type { DiscoveryEvent, PeerRecord } from './discovery/peer.js';
import type { LocalDevice } from './identity/device.js';
import { createLogger, type Logger } from './logger.js';
import type { AnyEnvelope, DecodedEnvelope, DeviceInfoPayload, MessageKind } from './message/envelope.js';
import {
  PairingCoordinator,
  type PairingApprover,
  type PairingResult,
  type PairingRole,
} from './pairing/coordinator.js';
import { PairingKey } from './pairing/pairing-key.js';
import { FramedChannel } from './session/channel.js';
import type { MessageHandler } from './session/dispatcher.js';
import {
  SessionManager,
  type SendResult,
  type SessionInfo,
  type SessionState,
} from './session/session-manager.js';
import type { ReconnectPolicy } from './session/backoff.js';
import { FileTrustStore, type TrustRecord, type TrustStore } from './trust/trust-store.js';
import { TcpTransport } from './transport/tcp.js';
import type { Endpoint, StreamWrapper, Transport, TransportListener } from './transport/types.js';
import { wrapTransport } from './transport/types.js';
import { WebSocketTransport } from './transport/websocket.js';

export interface LinkNodeOptions {
  device: LocalDevice;
  transport: Transport;
  announcementChannel: AnnouncementChannel;
  trustStore: TrustStore;
  /** Listening port (default: 1716; 0 picks a free one) */
  port?: number;
  discovery?: {
    announceIntervalMs?: number;
    peerTimeoutMs?: number;
  };
  session?: {
    connectTimeoutMs?: number;
    idleTimeoutMs?: number;
    keepaliveIntervalMs?: number;
    maxFrameBytes?: number;
    reconnect?: Partial<ReconnectPolicy>;
  };
  pairing?: {
    timeoutMs?: number;
    autoAccept?: boolean;
    approver?: PairingApprover;
    pairingKey?: PairingKey;
  };
  logger?: Logger;
}

/**
 * Events emitted by LinkNode
 */
export interface LinkNodeEvents {
  'discovery': (event: DiscoveryEvent) => void;
  'state-changed': (peerId: string, state: SessionState, previous: SessionState) => void;
  'unhandled-message': (peerId: string, envelope: DecodedEnvelope) => void;
  'reconnect-exhausted': (peerId: string) => void;
  'paired': (record: TrustRecord, role: PairingRole) => void;
  'peer-info': (peerId: string, info: DeviceInfoPayload) => void;
}

/**
 * One device on the local network: advertises itself, browses for peers,
 * pairs with them and keeps sessions to the paired ones.
 */
export class LinkNode extends EventEmitter {
  readonly device: LocalDevice;
  private transport: Transport;
  private trustStore: TrustStore;
  private port: number;
  private handshakeTimeoutMs: number;
  private maxFrameBytes?: number;
  private logger: Logger;

  private discovery: DiscoveryEngine;
  private sessions: SessionManager;
  private pairing: PairingCoordinator;
  private listener: TransportListener | null = null;
  private onDiscovery = (event: DiscoveryEvent): void => {
    this.emit('discovery', event);
    this.sessions.handleDiscoveryEvent(event).catch((err: unknown) => {
      this.logger.error(`discovery event handling failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  };

  constructor(options: LinkNodeOptions) {
    super();
    this.device = options.device;
    this.transport = options.transport;
    this.trustStore = options.trustStore;
    this.port = options.port ?? 1716;
    this.handshakeTimeoutMs = options.session?.connectTimeoutMs ?? 10000;
    this.maxFrameBytes = options.session?.maxFrameBytes;
    this.logger = options.logger ?? createLogger('node');

    this.discovery = new DiscoveryEngine({
      channel: options.announcementChannel,
      localId: this.device.id,
      announceIntervalMs: options.discovery?.announceIntervalMs,
      peerTimeoutMs: options.discovery?.peerTimeoutMs,
      logger: options.logger,
    });

    this.sessions = new SessionManager({
      local: this.device,
      transport: this.transport,
      trustStore: this.trustStore,
      peers: this.discovery,
      ...options.session,
      logger: options.logger,
    });

    this.pairing = new PairingCoordinator({
      local: this.device,
      transport: this.transport,
      trustStore: this.trustStore,
      timeoutMs: options.pairing?.timeoutMs,
      connectTimeoutMs: options.session?.connectTimeoutMs,
      autoAccept: options.pairing?.autoAccept,
      approver: options.pairing?.approver,
      pairingKey: options.pairing?.pairingKey,
      maxFrameBytes: this.maxFrameBytes,
      logger: options.logger,
      onPaired: (peerId, channel, role, remote) => {
        this.sessions.adopt(peerId, channel, role === 'initiator' ? 'outbound' : 'inbound', remote);
      },
    });

    this.sessions.on('state-changed', (peerId: string, state: SessionState, previous: SessionState) => {
      this.emit('state-changed', peerId, state, previous);
    });
    this.sessions.on('unhandled-message', (peerId: string, envelope: DecodedEnvelope) => {
      this.emit('unhandled-message', peerId, envelope);
    });
    this.sessions.on('reconnect-exhausted', (peerId: string) => {
      this.emit('reconnect-exhausted', peerId);
    });
    this.sessions.on('peer-info', (peerId: string, info: DeviceInfoPayload) => {
      this.emit('peer-info', peerId, info);
    });
    this.pairing.on('paired', (record: TrustRecord, role: PairingRole) => {
      this.emit('paired', record, role);
    });
  }

  /**
   * Listen for connections, advertise and browse.
   *
   * @throws NetworkUnavailableError when no local network can be used
   */
  async start(): Promise<void> {
    if (this.listener) {
      return;
    }

    const listener = await this.transport.listen(this.port, (stream, remote) => this.handleInbound(stream, remote));
    try {
      await this.discovery.startAdvertising({
        id: this.device.id,
        name: this.device.name,
        kind: this.device.kind,
        port: listener.port,
        capabilities: this.device.capabilities,
      });
      this.discovery.on('discovery', this.onDiscovery);
      await this.discovery.browse();
    } catch (err) {
      this.discovery.off('discovery', this.onDiscovery);
      await this.discovery.close();
      await listener.close();
      throw err;
    }

    this.listener = listener;
    this.logger.info(`${this.device.name} (${this.device.id}) listening on port ${listener.port}`);
  }

  /**
   * Abort pairings in progress, close every session, stop discovery and the listener.
   */
  async stop(): Promise<void> {
    this.pairing.close();
    await this.sessions.close();
    this.discovery.off('discovery', this.onDiscovery);
    await this.discovery.close();
    const listener = this.listener;
    this.listener = null;
    await listener?.close();
  }

  /** Port the node accepts connections on, once started */
  listeningPort(): number | undefined {
    return this.listener?.port;
  }

  /**
   * Open a new stream of discovery events.
   */
  discover(): Promise<DiscoveryStream> {
    return this.discovery.startBrowsing();
  }

  knownPeers(): PeerRecord[] {
    return this.discovery.listPeers();
  }

  findByCapability(capability: string): PeerRecord[] {
    return this.discovery.findByCapability(capability);
  }

  /**
   * Pair with a discovered peer. `proof` is the code shown on the peer.
   */
  async pair(peerId: string, proof?: string): Promise<PairingResult> {
    const peer = this.discovery.getPeer(peerId);
    if (!peer) {
      return { ok: false, error: new UnknownPeerError(peerId) };
    }
    return this.pairing.initiatePairing(peer, proof);
  }

  /** Code a remote user must enter to pair with this node */
  pairingCode(): string {
    return this.pairing.pairingCode();
  }

  /**
   * Decide incoming pairing requests, replacing the pairing-code check.
   */
  onPairingRequest(approver: PairingApprover): void {
    this.pairing.setApprover(approver);
  }

  connect(peerId: string): Promise<void> {
    return this.sessions.connect(peerId);
  }

  disconnect(peerId: string): Promise<void> {
    return this.sessions.disconnect(peerId);
  }

  send(peerId: string, envelope: AnyEnvelope): Promise<SendResult> {
    return this.sessions.send(peerId, envelope);
  }

  registerHandler<K extends MessageKind>(kind: K, handler: MessageHandler<K>): () => void {
    return this.sessions.registerHandler(kind, handler);
  }

  sessionState(peerId: string): SessionState {
    return this.sessions.sessionState(peerId);
  }

  sessionInfo(peerId: string): SessionInfo | undefined {
    return this.sessions.getSession(peerId);
  }

  listTrusted(): Promise<TrustRecord[]> {
    return this.trustStore.loadAll();
  }

  /**
   * Drop trust in a peer, closing its session first.
   *
   * @returns true if the peer was trusted
   */
  async forget(peerId: string): Promise<boolean> {
    await this.sessions.disconnect(peerId);
    return this.trustStore.remove(peerId);
  }

  async forgetAll(): Promise<void> {
    const trusted = await this.trustStore.loadAll();
    await Promise.all(trusted.map(record => this.sessions.disconnect(record.peerId)));
    await this.trustStore.clearAll();
  }

  /**
   * Route an accepted connection by its first envelope: `device-info`
   * opens a session, `pairing-request` starts pairing, anything else is dropped.
   */
  private handleInbound(stream: Duplex, remote: Endpoint): void {
    const channel = new FramedChannel(stream, { maxFrameBytes: this.maxFrameBytes, remote });

    channel.firstEnvelope(this.handshakeTimeoutMs, (error) => {
      this.logger.debug(`skipped bad frame from ${remote.address}: ${error.message}`);
    })
      .then(async (envelope) => {
        switch (envelope.kind) {
          case 'device-info':
            await this.sessions.acceptInbound(channel, envelope.payload);
            return;
          case 'pairing-request':
            await this.pairing.handleRequest(channel, envelope.payload, remote);
            return;
          default:
            this.logger.warn(`unexpected ${envelope.kind} as first frame from ${remote.address}`);
            await channel.close();
        }
      })
      .catch((err: unknown) => {
        this.logger.debug(`inbound connection from ${remote.address} dropped: ${err instanceof Error ? err.message : String(err)}`);
        channel.destroy();
      });
  }
}

/**
 * Build a node from configuration using the real network stack.
 */
export function createNode(config: LinkConfig, options: { wrapper?: StreamWrapper; logger?: Logger } = {}): LinkNode {
  const base: Transport = config.transport === 'websocket'
    ? new WebSocketTransport({ logger: options.logger })
    : new TcpTransport({ logger: options.logger });

  return new LinkNode({
    device: config.device,
    transport: options.wrapper ? wrapTransport(base, options.wrapper) : base,
    announcementChannel: new MulticastChannel({
      group: config.discovery.group,
      port: config.discovery.port,
      logger: options.logger,
    }),
    trustStore: new FileTrustStore(config.trustStorePath, options.logger),
    port: config.port,
    discovery: {
      announceIntervalMs: config.discovery.announceIntervalMs,
      peerTimeoutMs: config.discovery.peerTimeoutMs,
    },
    session: config.session,
    pairing: config.pairing,
    logger: options.logger,
  });
}
