import { EventEmitter } from 'node:events';
import {
  LinkError,
  NotConnectedError,
  NotPairedError,
  PayloadTooLargeError,
  TransportLostError,
  UnknownPeerError,
  type SendError,
} from '../errors.js';
import type { LocalDevice } from '../identity/device.js';
import { createLogger, type Logger } from '../logger.js';
import {
  createEnvelope,
  type DecodedEnvelope,
  type DeviceInfoPayload,
  type AnyEnvelope,
  type MessageKind,
} from '../message/envelope.js';
import type { DiscoveryEvent, PeerLookup, PeerRecord } from '../discovery/peer.js';
import type { TrustRecord, TrustStore } from '../trust/trust-store.js';
import type { Transport } from '../transport/types.js';
import { backoffDelay, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from './backoff.js';
import { FramedChannel } from './channel.js';
import { MessageDispatcher, type MessageHandler } from './dispatcher.js';

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export type SessionDirection = 'outbound' | 'inbound';

/** `disconnect` reasons sent when refusing an inbound channel */
export const DisconnectReason = {
  User: 'user',
  NotPaired: 'not-paired',
  InvalidCredential: 'invalid-credential',
  Duplicate: 'duplicate-connection',
  Shutdown: 'shutdown',
} as const;

export type SendResult = { ok: true } | { ok: false; error: SendError };

/**
 * Snapshot of a session for observers.
 */
export interface SessionInfo {
  peerId: string;
  state: SessionState;
  direction: SessionDirection;
  pendingWrites: number;
  /** Unix timestamp (ms); 0 when there is no channel */
  lastActivity: number;
  /** Latest device-info received from the peer */
  remote?: DeviceInfoPayload;
}

export interface SessionManagerOptions {
  local: LocalDevice;
  transport: Transport;
  trustStore: TrustStore;
  /** Latest known endpoints, normally the discovery engine */
  peers: PeerLookup;
  dispatcher?: MessageDispatcher;
  /** Dial timeout (default: 10000) */
  connectTimeoutMs?: number;
  /** Silence after which a session counts as lost (default: 60000) */
  idleTimeoutMs?: number;
  /** Ping period (default: idleTimeoutMs / 3) */
  keepaliveIntervalMs?: number;
  /** Bound on the farewell flush when disconnecting (default: 1000) */
  disconnectTimeoutMs?: number;
  maxFrameBytes?: number;
  reconnect?: Partial<ReconnectPolicy>;
  logger?: Logger;
  now?: () => number;
}

/**
 * Events emitted by SessionManager
 */
export interface SessionManagerEvents {
  'state-changed': (peerId: string, state: SessionState, previous: SessionState) => void;
  /** Envelope of an unknown kind, or a kind with no registered handler */
  'unhandled-message': (peerId: string, envelope: DecodedEnvelope) => void;
  /** Reconnection gave up; the session is now disconnected */
  'reconnect-exhausted': (peerId: string) => void;
  /** The peer sent (new) device information */
  'peer-info': (peerId: string, info: DeviceInfoPayload) => void;
}

interface Session {
  peerId: string;
  state: SessionState;
  direction: SessionDirection;
  channel: FramedChannel | null;
  /** Bumped whenever the session's channel is replaced or dropped */
  generation: number;
  remote?: DeviceInfoPayload;
  keepaliveTimer: NodeJS.Timeout | null;
  idleTimer: NodeJS.Timeout | null;
  reconnectTimer: NodeJS.Timeout | null;
  reconnectAttempt: number;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns every live connection to a paired peer.
 *
 * Each peer has at most one session. A session is created by dialing
 * (connect), by accepting an inbound channel that opens with a valid
 * device-info, or by adopting the channel a successful pairing left open.
 * Lost sessions are retried with exponential backoff against the latest
 * discovered endpoint.
 */
export class SessionManager extends EventEmitter {
  private local: LocalDevice;
  private transport: Transport;
  private trustStore: TrustStore;
  private peers: PeerLookup;
  private dispatcher: MessageDispatcher;
  private connectTimeoutMs: number;
  private idleTimeoutMs: number;
  private keepaliveIntervalMs: number;
  private disconnectTimeoutMs: number;
  private maxFrameBytes?: number;
  private policy: ReconnectPolicy;
  private logger: Logger;
  private now: () => number;

  private sessions = new Map<string, Session>();
  private closed = false;

  constructor(options: SessionManagerOptions) {
    super();
    this.local = options.local;
    this.transport = options.transport;
    this.trustStore = options.trustStore;
    this.peers = options.peers;
    this.dispatcher = options.dispatcher ?? new MessageDispatcher(options.logger);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60000;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? Math.floor(this.idleTimeoutMs / 3);
    this.disconnectTimeoutMs = options.disconnectTimeoutMs ?? 1000;
    this.maxFrameBytes = options.maxFrameBytes;
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };
    this.logger = options.logger ?? createLogger('session');
    this.now = options.now ?? Date.now;
  }

  registerHandler<K extends MessageKind>(kind: K, handler: MessageHandler<K>): () => void {
    return this.dispatcher.register(kind, handler);
  }

  /**
   * Open a session to a paired peer using its discovered endpoint.
   * Resolves once our device-info has been written. No-op if a session is
   * already connecting or connected.
   *
   * @throws NotPairedError without dialing if the peer is not trusted
   * @throws UnknownPeerError if the peer has not been discovered
   */
  async connect(peerId: string): Promise<void> {
    const trust = await this.trustStore.get(peerId);
    if (!trust) {
      throw new NotPairedError(peerId);
    }

    const existing = this.sessions.get(peerId);
    if (existing && (existing.state === 'connecting' || existing.state === 'connected')) {
      return;
    }

    const session = existing ?? this.createSession(peerId, 'outbound');
    this.cancelReconnect(session);

    const peer = this.peers.getPeer(peerId);
    if (!peer) {
      this.setState(session, 'disconnected');
      throw new UnknownPeerError(peerId);
    }

    try {
      await this.dial(session, peer, trust);
    } catch (err) {
      if (session.state === 'connecting' && !session.channel) {
        this.setState(session, 'disconnected');
      }
      throw err;
    }
  }

  /**
   * Take over a channel left open by a completed pairing.
   */
  adopt(peerId: string, channel: FramedChannel, direction: SessionDirection, remote?: DeviceInfoPayload): void {
    if (this.closed) {
      channel.destroy();
      return;
    }
    if (!channel.isOpen()) {
      this.logger.warn(`channel from pairing with ${peerId} closed before handoff`);
      return;
    }
    const session = this.sessions.get(peerId) ?? this.createSession(peerId, direction);
    this.cancelReconnect(session);
    this.replaceChannel(session, channel, direction);
    if (remote) {
      session.remote = remote;
    }
    session.reconnectAttempt = 0;
    this.setState(session, 'connected');
  }

  /**
   * Handle an inbound channel whose first envelope was `info`.
   * The peer must be trusted and present the credential agreed during
   * pairing; otherwise it gets a `disconnect` and the channel is closed.
   *
   * @returns true if the channel became the peer's session
   */
  async acceptInbound(channel: FramedChannel, info: DeviceInfoPayload): Promise<boolean> {
    const peerId = info.id;
    const trust = await this.trustStore.get(peerId);

    if (this.closed) {
      await this.refuse(channel, DisconnectReason.Shutdown);
      return false;
    }
    if (!trust) {
      this.logger.warn(`refusing session from untrusted peer ${peerId}`);
      await this.refuse(channel, DisconnectReason.NotPaired);
      return false;
    }
    if (trust.credential !== undefined && info.credential !== trust.credential) {
      this.logger.warn(`refusing session from ${peerId}: credential mismatch`);
      await this.refuse(channel, DisconnectReason.InvalidCredential);
      return false;
    }

    const existing = this.sessions.get(peerId);
    if (
      existing &&
      existing.direction === 'outbound' &&
      (existing.state === 'connecting' || existing.state === 'connected') &&
      this.local.id < peerId
    ) {
      this.logger.debug(`keeping our own connection to ${peerId}`);
      await this.refuse(channel, DisconnectReason.Duplicate);
      return false;
    }

    const session = existing ?? this.createSession(peerId, 'inbound');
    this.cancelReconnect(session);
    this.setState(session, 'connecting');
    this.replaceChannel(session, channel, 'inbound');
    session.remote = info;
    const generation = session.generation;

    try {
      await channel.send(createEnvelope('device-info', this.deviceInfo()));
    } catch (err) {
      this.logger.warn(`device-info reply to ${peerId} failed: ${describe(err)}`);
      if (session.generation === generation) {
        this.handleLoss(session, 'reply failed');
      }
      return false;
    }

    if (session.generation !== generation) {
      return false;
    }
    if (!channel.isOpen()) {
      this.handleLoss(session, 'closed during handshake');
      return false;
    }
    session.reconnectAttempt = 0;
    this.setState(session, 'connected');
    this.emit('peer-info', peerId, info);
    return true;
  }

  /**
   * Close the session with a best-effort farewell. Never throws.
   */
  async disconnect(peerId: string, reason: string = DisconnectReason.User): Promise<void> {
    const session = this.sessions.get(peerId);
    if (!session) {
      return;
    }

    this.cancelReconnect(session);
    const channel = this.releaseChannel(session);
    this.setState(session, 'disconnected');

    if (channel) {
      await this.farewell(channel, reason);
    }
  }

  /**
   * Queue an envelope on the peer's session. Frames to one peer are written
   * in call order.
   */
  async send(peerId: string, envelope: AnyEnvelope): Promise<SendResult> {
    const session = this.sessions.get(peerId);
    const channel = session?.channel;
    if (!session || session.state !== 'connected' || !channel) {
      return { ok: false, error: new NotConnectedError(peerId) };
    }

    try {
      await channel.send(envelope);
      return { ok: true };
    } catch (err) {
      if (err instanceof PayloadTooLargeError || err instanceof TransportLostError) {
        return { ok: false, error: err };
      }
      return { ok: false, error: new TransportLostError(describe(err), err instanceof Error ? err : undefined) };
    }
  }

  sessionState(peerId: string): SessionState {
    return this.sessions.get(peerId)?.state ?? 'disconnected';
  }

  getSession(peerId: string): SessionInfo | undefined {
    const session = this.sessions.get(peerId);
    return session ? this.snapshot(session) : undefined;
  }

  listSessions(): SessionInfo[] {
    return Array.from(this.sessions.values(), session => this.snapshot(session));
  }

  /**
   * React to discovery: connect to trusted peers that appear, and retry
   * reconnecting sessions as soon as their peer is seen again.
   */
  async handleDiscoveryEvent(event: DiscoveryEvent): Promise<void> {
    if (this.closed || event.type === 'peer-disappeared') {
      return;
    }

    const peerId = event.peer.peerId;
    const session = this.sessions.get(peerId);

    if (session?.state === 'reconnecting') {
      this.retryNow(session);
      return;
    }
    if (event.type !== 'peer-appeared' || (session && session.state !== 'disconnected')) {
      return;
    }
    if (!(await this.trustStore.isTrusted(peerId))) {
      return;
    }

    try {
      await this.connect(peerId);
    } catch (err) {
      this.logger.warn(`auto-connect to ${peerId} failed: ${describe(err)}`);
    }
  }

  /**
   * Disconnect every session and cancel all timers.
   */
  async close(): Promise<void> {
    this.closed = true;
    const peerIds = Array.from(this.sessions.keys());
    await Promise.all(peerIds.map(peerId => this.disconnect(peerId, DisconnectReason.Shutdown)));
    this.sessions.clear();
  }

  private createSession(peerId: string, direction: SessionDirection): Session {
    const session: Session = {
      peerId,
      state: 'disconnected',
      direction,
      channel: null,
      generation: 0,
      keepaliveTimer: null,
      idleTimer: null,
      reconnectTimer: null,
      reconnectAttempt: 0,
    };
    this.sessions.set(peerId, session);
    return session;
  }

  private snapshot(session: Session): SessionInfo {
    return {
      peerId: session.peerId,
      state: session.state,
      direction: session.direction,
      pendingWrites: session.channel?.pendingWrites ?? 0,
      lastActivity: session.channel?.lastActivity ?? 0,
      ...(session.remote ? { remote: { ...session.remote } } : {}),
    };
  }

  private deviceInfo(credential?: string): DeviceInfoPayload {
    const info: DeviceInfoPayload = {
      id: this.local.id,
      name: this.local.name,
      deviceType: this.local.kind,
      capabilities: [...this.local.capabilities],
    };
    if (credential !== undefined) {
      info.credential = credential;
    }
    return info;
  }

  private setState(session: Session, state: SessionState): void {
    const previous = session.state;
    if (previous === state) {
      return;
    }
    session.state = state;
    this.logger.info(`${session.peerId}: ${previous} -> ${state}`);
    this.emit('state-changed', session.peerId, state, previous);
  }

  /**
   * Dial `peer` and open the session with our device-info.
   * Leaves the session `connected`, or throws with the session untouched by
   * later events if another channel took over meanwhile.
   */
  private async dial(session: Session, peer: PeerRecord, trust: TrustRecord): Promise<void> {
    this.releaseChannel(session);
    const generation = session.generation;
    session.direction = 'outbound';
    this.setState(session, 'connecting');

    const stream = await this.transport.dial({ address: peer.address, port: peer.port }, this.connectTimeoutMs);

    if (session.generation !== generation || this.closed) {
      stream.destroy();
      if (session.state === 'connected') {
        return;
      }
      throw new TransportLostError('Connection attempt was superseded');
    }

    const channel = new FramedChannel(stream, {
      maxFrameBytes: this.maxFrameBytes,
      remote: { address: peer.address, port: peer.port },
      now: this.now,
    });
    this.replaceChannel(session, channel, 'outbound');
    const channelGeneration = session.generation;

    try {
      await channel.send(createEnvelope('device-info', this.deviceInfo(trust.credential)));
    } catch (err) {
      if (session.generation === channelGeneration) {
        this.releaseChannel(session)?.destroy();
      }
      throw LinkError.wrap(err, cause => new TransportLostError(cause.message, cause));
    }

    if (session.generation !== channelGeneration) {
      if (session.state === 'connected') {
        return;
      }
      throw new TransportLostError('Connection attempt was superseded');
    }
    if (!channel.isOpen()) {
      this.releaseChannel(session);
      throw new TransportLostError('Connection closed during handshake');
    }
    session.reconnectAttempt = 0;
    this.setState(session, 'connected');
  }

  /**
   * Make `channel` the session's channel, closing whatever it replaces.
   */
  private replaceChannel(session: Session, channel: FramedChannel, direction: SessionDirection): void {
    const previous = this.releaseChannel(session);
    previous?.destroy();

    session.channel = channel;
    session.direction = direction;
    const generation = session.generation;

    channel.attach({
      envelope: (envelope) => {
        if (session.generation === generation) {
          this.handleEnvelope(session, channel, envelope);
        }
      },
      frameError: (error) => {
        this.logger.warn(`dropping bad frame from ${session.peerId}: ${error.message}`);
      },
      closed: (error) => {
        // While connecting, the handshake write reports the failure.
        if (session.generation === generation && session.state !== 'connecting') {
          this.handleLoss(session, error ? error.message : 'stream closed');
        }
      },
    });

    session.keepaliveTimer = setInterval(() => {
      channel.send(createEnvelope('ping', {})).catch((err: unknown) => {
        this.logger.debug(`keepalive to ${session.peerId} failed: ${describe(err)}`);
      });
    }, this.keepaliveIntervalMs);
    this.armIdleTimer(session, channel);
  }

  /**
   * Detach and forget the session's channel without closing it.
   */
  private releaseChannel(session: Session): FramedChannel | null {
    session.generation++;
    if (session.keepaliveTimer) {
      clearInterval(session.keepaliveTimer);
      session.keepaliveTimer = null;
    }
    if (session.idleTimer) {
      clearTimeout(session.idleTimer);
      session.idleTimer = null;
    }
    const channel = session.channel;
    session.channel = null;
    channel?.detach();
    return channel;
  }

  private armIdleTimer(session: Session, channel: FramedChannel): void {
    const remaining = channel.lastActivity + this.idleTimeoutMs - this.now();
    session.idleTimer = setTimeout(() => {
      session.idleTimer = null;
      if (session.channel !== channel) {
        return;
      }
      if (this.now() - channel.lastActivity >= this.idleTimeoutMs) {
        this.handleLoss(session, `idle for ${this.idleTimeoutMs}ms`);
      } else {
        this.armIdleTimer(session, channel);
      }
    }, Math.max(remaining, 1));
  }

  private handleEnvelope(session: Session, channel: FramedChannel, envelope: DecodedEnvelope): void {
    const peerId = session.peerId;

    switch (envelope.kind) {
      case 'unknown':
        this.emit('unhandled-message', peerId, envelope);
        return;
      case 'ping':
        channel.send(createEnvelope('pong', {})).catch((err: unknown) => {
          this.logger.debug(`pong to ${peerId} failed: ${describe(err)}`);
        });
        return;
      case 'pong':
        return;
      case 'device-info':
        if (envelope.payload.id === peerId) {
          session.remote = envelope.payload;
          this.emit('peer-info', peerId, envelope.payload);
        }
        return;
      case 'disconnect':
        this.handleFarewell(session, envelope.payload.reason);
        return;
      case 'pairing-request':
      case 'pairing-accepted':
      case 'pairing-rejected':
        this.logger.debug(`ignoring ${envelope.kind} on session with ${peerId}`);
        return;
      default:
        if (this.dispatcher.dispatch(peerId, envelope) === 0) {
          this.emit('unhandled-message', peerId, envelope);
        }
    }
  }

  private handleFarewell(session: Session, reason?: string): void {
    this.logger.info(`${session.peerId} disconnected${reason ? ` (${reason})` : ''}`);
    if (reason === DisconnectReason.Duplicate) {
      // The peer keeps the connection it dialed; ours is redundant.
      this.handleLoss(session, reason);
      return;
    }
    this.cancelReconnect(session);
    this.releaseChannel(session)?.destroy();
    this.setState(session, 'disconnected');
  }

  private handleLoss(session: Session, reason: string): void {
    this.releaseChannel(session)?.destroy();
    if (this.closed) {
      this.setState(session, 'disconnected');
      return;
    }
    this.logger.warn(`lost session with ${session.peerId}: ${reason}`);
    this.setState(session, 'reconnecting');
    session.reconnectAttempt = 0;
    this.scheduleReconnect(session);
  }

  private scheduleReconnect(session: Session): void {
    if (session.reconnectAttempt >= this.policy.maxAttempts) {
      this.logger.warn(`giving up on ${session.peerId} after ${session.reconnectAttempt} attempts`);
      this.setState(session, 'disconnected');
      this.emit('reconnect-exhausted', session.peerId);
      return;
    }

    const delay = backoffDelay(session.reconnectAttempt, this.policy);
    session.reconnectAttempt++;
    this.logger.debug(`reconnecting to ${session.peerId} in ${delay}ms (attempt ${session.reconnectAttempt})`);
    session.reconnectTimer = setTimeout(() => {
      session.reconnectTimer = null;
      this.attemptReconnect(session).catch((err: unknown) => {
        this.logger.error(`reconnect to ${session.peerId} failed: ${describe(err)}`);
      });
    }, delay);
  }

  /**
   * Run the pending retry immediately.
   */
  private retryNow(session: Session): void {
    if (!session.reconnectTimer) {
      return;
    }
    clearTimeout(session.reconnectTimer);
    session.reconnectTimer = null;
    this.attemptReconnect(session).catch((err: unknown) => {
      this.logger.error(`reconnect to ${session.peerId} failed: ${describe(err)}`);
    });
  }

  private cancelReconnect(session: Session): void {
    if (session.reconnectTimer) {
      clearTimeout(session.reconnectTimer);
      session.reconnectTimer = null;
    }
  }

  private async attemptReconnect(session: Session): Promise<void> {
    if (this.closed || session.state !== 'reconnecting') {
      return;
    }

    const trust = await this.trustStore.get(session.peerId);
    if (!trust) {
      this.setState(session, 'disconnected');
      return;
    }

    const peer = this.peers.getPeer(session.peerId);
    if (!peer) {
      this.logger.debug(`${session.peerId} not currently discovered`);
      this.scheduleReconnect(session);
      return;
    }

    try {
      await this.dial(session, peer, trust);
    } catch (err) {
      this.logger.debug(`reconnect to ${session.peerId} failed: ${describe(err)}`);
      if (session.state === 'connecting' && !session.channel && !this.closed) {
        this.setState(session, 'reconnecting');
        this.scheduleReconnect(session);
      }
    }
  }

  private async refuse(channel: FramedChannel, reason: string): Promise<void> {
    channel.detach();
    await this.farewell(channel, reason);
  }

  private async farewell(channel: FramedChannel, reason: string): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const sent = channel.send(createEnvelope('disconnect', { reason })).catch((err: unknown) => {
      this.logger.debug(`farewell not delivered: ${describe(err)}`);
    });
    await Promise.race([
      sent,
      new Promise<void>(resolve => {
        timer = setTimeout(resolve, this.disconnectTimeoutMs);
      }),
    ]);
    clearTimeout(timer);
    await channel.close({ flushTimeoutMs: this.disconnectTimeoutMs });
  }
}
