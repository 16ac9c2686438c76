import { EventEmitter } from 'node:events';
import {
  LinkError,
  PairingAlreadyInProgressError,
  PairingRejectedError,
  PairingTimedOutError,
  TransportLostError,
  type PairingError,
} from '../errors.js';
import { generateCredential, type DeviceKind, type LocalDevice } from '../identity/device.js';
import { createLogger, type Logger } from '../logger.js';
import {
  createEnvelope,
  isKind,
  type DeviceInfoPayload,
  type EnvelopeMap,
  type PairingRequestPayload,
} from '../message/envelope.js';
import type { PeerRecord } from '../discovery/peer.js';
import { FramedChannel } from '../session/channel.js';
import type { TrustRecord, TrustStore } from '../trust/trust-store.js';
import type { Endpoint, Transport } from '../transport/types.js';
import { PairingKey } from './pairing-key.js';

export type PairingState = 'idle' | 'request-sent' | 'accepted' | 'rejected' | 'timed-out';

export type PairingRole = 'initiator' | 'responder';

export type PairingResult = { ok: true; record: TrustRecord } | { ok: false; error: PairingError };

/**
 * An incoming pairing request, as shown to whoever approves it.
 */
export interface PairingRequest {
  peerId: string;
  displayName: string;
  kind: DeviceKind;
  capabilities: string[];
  proof?: string;
  remote?: Endpoint;
}

export type PairingDecision = { accept: true } | { accept: false; reason?: string };

export type PairingApprover = (request: PairingRequest) => PairingDecision | Promise<PairingDecision>;

/**
 * Receives the channel of a completed pairing, still open, so it can become the session.
 */
export type PairingHandoff = (peerId: string, channel: FramedChannel, role: PairingRole, remote: DeviceInfoPayload) => void;

export interface PairingCoordinatorOptions {
  local: LocalDevice;
  transport: Transport;
  trustStore: TrustStore;
  onPaired: PairingHandoff;
  /** Wait for the peer's answer (default: 10000) */
  timeoutMs?: number;
  connectTimeoutMs?: number;
  pairingKey?: PairingKey;
  /** Accept every request without checking the pairing code */
  autoAccept?: boolean;
  approver?: PairingApprover;
  maxFrameBytes?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Events emitted by PairingCoordinator
 */
export interface PairingCoordinatorEvents {
  'paired': (record: TrustRecord, role: PairingRole) => void;
  'state-changed': (peerId: string, state: PairingState) => void;
}

/**
 * Runs both sides of the trust handshake.
 *
 * The initiator sends `pairing-request` and waits for `pairing-accepted` or
 * `pairing-rejected`. On acceptance both sides store a TrustRecord with the
 * credential the responder minted, and the channel stays open as the first
 * session between the two.
 */
export class PairingCoordinator extends EventEmitter {
  private local: LocalDevice;
  private transport: Transport;
  private trustStore: TrustStore;
  private onPaired: PairingHandoff;
  private timeoutMs: number;
  private connectTimeoutMs: number;
  private pairingKey: PairingKey;
  private approver: PairingApprover;
  private maxFrameBytes?: number;
  private logger: Logger;
  private now: () => number;

  private inFlight = new Set<string>();
  private states = new Map<string, PairingState>();
  private channels = new Set<FramedChannel>();
  private pendingDecisions = new Set<(decision: PairingDecision) => void>();
  private closed = false;

  constructor(options: PairingCoordinatorOptions) {
    super();
    this.local = options.local;
    this.transport = options.transport;
    this.trustStore = options.trustStore;
    this.onPaired = options.onPaired;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.pairingKey = options.pairingKey ?? new PairingKey();
    this.maxFrameBytes = options.maxFrameBytes;
    this.logger = options.logger ?? createLogger('pairing');
    this.now = options.now ?? Date.now;
    this.approver = options.approver ?? (options.autoAccept ? () => ({ accept: true }) : this.codeApprover());
  }

  /** Code a remote user must enter to pair with us */
  pairingCode(): string {
    return this.pairingKey.current();
  }

  setApprover(approver: PairingApprover): void {
    this.approver = approver;
  }

  pairingState(peerId: string): PairingState {
    return this.states.get(peerId) ?? 'idle';
  }

  isPairing(peerId: string): boolean {
    return this.inFlight.has(peerId);
  }

  /**
   * Abort every pairing in progress. Pending initiatePairing() calls resolve
   * with PairingTimedOutError, pending approvals are answered with a
   * rejection, and nothing more is written to the trust store.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const settle of this.pendingDecisions) {
      settle({ accept: false, reason: 'shutting down' });
    }
    this.pendingDecisions.clear();
    for (const channel of this.channels) {
      channel.destroy();
    }
    this.channels.clear();
  }

  /**
   * Ask `peer` to pair. Other envelopes arriving before the answer are ignored.
   */
  async initiatePairing(peer: PeerRecord, proof?: string): Promise<PairingResult> {
    const peerId = peer.peerId;
    if (this.inFlight.has(peerId)) {
      return { ok: false, error: new PairingAlreadyInProgressError(peerId) };
    }
    if (this.closed) {
      return this.timedOut(peerId, new TransportLostError('Pairing coordinator is closed'));
    }

    this.inFlight.add(peerId);
    this.setState(peerId, 'request-sent');
    try {
      return await this.runInitiator(peer, proof);
    } finally {
      this.inFlight.delete(peerId);
    }
  }

  /**
   * Answer a request received on `channel` with `decision`.
   * On acceptance the TrustRecord is stored before `pairing-accepted` is sent.
   */
  async respondToPairing(
    request: PairingRequest,
    channel: FramedChannel,
    decision: PairingDecision,
  ): Promise<PairingResult> {
    const peerId = request.peerId;

    if (!decision.accept) {
      this.setState(peerId, 'rejected');
      try {
        await channel.send(createEnvelope('pairing-rejected', {
          peerId: this.local.id,
          ...(decision.reason !== undefined ? { reason: decision.reason } : {}),
        }));
      } catch (err) {
        this.logger.debug(`rejection not delivered to ${peerId}: ${err instanceof Error ? err.message : String(err)}`);
      }
      await channel.close();
      return { ok: false, error: new PairingRejectedError(peerId, decision.reason) };
    }

    if (this.closed) {
      channel.destroy();
      return this.timedOut(peerId, new TransportLostError('Pairing coordinator is closed'));
    }

    const record: TrustRecord = {
      peerId,
      displayName: request.displayName,
      credential: generateCredential(),
      pairedAt: this.now(),
    };
    try {
      await this.trustStore.upsert(record);
    } catch (err) {
      this.logger.error(`could not store pairing with ${peerId}: ${err instanceof Error ? err.message : String(err)}`);
      try {
        await channel.send(createEnvelope('pairing-rejected', { peerId: this.local.id, reason: 'could not store pairing' }));
      } catch (sendErr) {
        this.logger.debug(`rejection not delivered to ${peerId}: ${sendErr instanceof Error ? sendErr.message : String(sendErr)}`);
      }
      await channel.close();
      return this.timedOut(peerId, err);
    }

    try {
      await channel.send(createEnvelope('pairing-accepted', { peerId: this.local.id, credential: record.credential }));
    } catch (err) {
      channel.destroy();
      await this.discard(peerId);
      this.setState(peerId, 'timed-out');
      return {
        ok: false,
        error: new PairingTimedOutError(peerId, err instanceof Error ? err : undefined),
      };
    }

    this.pairingKey.rotate();
    this.setState(peerId, 'accepted');
    this.logger.info(`paired with ${request.displayName} (${peerId}) as responder`);
    this.emit('paired', record, 'responder');
    this.onPaired(peerId, channel, 'responder', {
      id: peerId,
      name: request.displayName,
      deviceType: request.kind,
      capabilities: [...request.capabilities],
    });
    return { ok: true, record };
  }

  /**
   * Handle an inbound channel whose first envelope was a pairing request:
   * consult the approver (bounded by the pairing timeout) and respond.
   */
  async handleRequest(channel: FramedChannel, payload: PairingRequestPayload, remote?: Endpoint): Promise<PairingResult> {
    const request: PairingRequest = {
      peerId: payload.id,
      displayName: payload.name,
      kind: payload.deviceType,
      capabilities: [...payload.capabilities],
      ...(payload.proof !== undefined ? { proof: payload.proof } : {}),
      ...(remote ? { remote } : {}),
    };

    if (this.inFlight.has(request.peerId)) {
      return this.respondToPairing(request, channel, { accept: false, reason: 'pairing already in progress' });
    }

    this.inFlight.add(request.peerId);
    this.channels.add(channel);
    try {
      const decision = await this.decide(request);
      return await this.respondToPairing(request, channel, decision);
    } finally {
      this.channels.delete(channel);
      this.inFlight.delete(request.peerId);
    }
  }

  private async runInitiator(peer: PeerRecord, proof?: string): Promise<PairingResult> {
    const peerId = peer.peerId;
    const endpoint = { address: peer.address, port: peer.port };

    let channel: FramedChannel;
    try {
      const stream = await this.transport.dial(endpoint, this.connectTimeoutMs);
      channel = new FramedChannel(stream, { maxFrameBytes: this.maxFrameBytes, remote: endpoint, now: this.now });
    } catch (err) {
      return this.timedOut(peerId, err);
    }
    if (this.closed) {
      channel.destroy();
      return this.timedOut(peerId, new TransportLostError('Pairing coordinator is closed'));
    }

    this.channels.add(channel);
    try {
      return await this.exchange(peer, channel, proof);
    } finally {
      this.channels.delete(channel);
    }
  }

  private async exchange(peer: PeerRecord, channel: FramedChannel, proof?: string): Promise<PairingResult> {
    const peerId = peer.peerId;

    const request: PairingRequestPayload = {
      id: this.local.id,
      name: this.local.name,
      deviceType: this.local.kind,
      capabilities: [...this.local.capabilities],
      ...(proof !== undefined ? { proof } : {}),
    };

    let reply: EnvelopeMap['pairing-accepted'] | EnvelopeMap['pairing-rejected'];
    try {
      await channel.send(createEnvelope('pairing-request', request));
      reply = await channel.waitFor(
        this.timeoutMs,
        envelope => isKind(envelope, 'pairing-accepted') || isKind(envelope, 'pairing-rejected') ? envelope : undefined,
        (error) => {
          this.logger.debug(`skipped bad frame from ${peerId} while pairing: ${error.message}`);
        },
      );
    } catch (err) {
      channel.destroy();
      return this.timedOut(peerId, err);
    }
    if (this.closed) {
      channel.destroy();
      return this.timedOut(peerId, new TransportLostError('Pairing coordinator is closed'));
    }

    if (reply.kind === 'pairing-rejected') {
      await channel.close();
      this.setState(peerId, 'rejected');
      this.logger.info(`pairing rejected by ${peerId}${reply.payload.reason ? `: ${reply.payload.reason}` : ''}`);
      return { ok: false, error: new PairingRejectedError(peerId, reply.payload.reason) };
    }

    if (reply.payload.peerId !== peerId) {
      channel.destroy();
      this.setState(peerId, 'rejected');
      this.logger.warn(`pairing with ${peerId} answered by ${reply.payload.peerId}`);
      return { ok: false, error: new PairingRejectedError(peerId, `answered by ${reply.payload.peerId}`) };
    }

    const record: TrustRecord = {
      peerId,
      displayName: peer.displayName,
      ...(reply.payload.credential !== undefined ? { credential: reply.payload.credential } : {}),
      pairedAt: this.now(),
    };
    try {
      await this.trustStore.upsert(record);
    } catch (err) {
      channel.destroy();
      return this.timedOut(peerId, err);
    }
    if (this.closed) {
      channel.destroy();
      await this.discard(peerId);
      return this.timedOut(peerId, new TransportLostError('Pairing coordinator is closed'));
    }

    this.setState(peerId, 'accepted');
    this.logger.info(`paired with ${peer.displayName} (${peerId}) as initiator`);
    this.emit('paired', record, 'initiator');
    this.onPaired(peerId, channel, 'initiator', {
      id: peerId,
      name: peer.displayName,
      deviceType: peer.kind,
      capabilities: [...peer.capabilities],
    });
    return { ok: true, record };
  }

  private async decide(request: PairingRequest): Promise<PairingDecision> {
    let settle: (decision: PairingDecision) => void = () => {};
    const fallback = new Promise<PairingDecision>(resolve => {
      settle = resolve;
    });
    const timer = setTimeout(() => settle({ accept: false, reason: 'approval timed out' }), this.timeoutMs);
    this.pendingDecisions.add(settle);
    try {
      return await Promise.race([Promise.resolve(this.approver(request)), fallback]);
    } catch (err) {
      this.logger.error(`pairing approver failed: ${err instanceof Error ? err.message : String(err)}`);
      return { accept: false, reason: 'approval failed' };
    } finally {
      clearTimeout(timer);
      this.pendingDecisions.delete(settle);
    }
  }

  private codeApprover(): PairingApprover {
    return (request) => {
      if (request.proof === undefined) {
        return { accept: false, reason: 'pairing code required' };
      }
      return this.pairingKey.matches(request.proof)
        ? { accept: true }
        : { accept: false, reason: 'invalid pairing code' };
    };
  }

  /** Undo a stored pairing that never completed */
  private async discard(peerId: string): Promise<void> {
    try {
      await this.trustStore.remove(peerId);
    } catch (err) {
      this.logger.error(`could not remove pairing with ${peerId}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private timedOut(peerId: string, err: unknown): PairingResult {
    const cause = LinkError.wrap(err, error => new PairingTimedOutError(peerId, error));
    this.setState(peerId, 'timed-out');
    this.logger.warn(`pairing with ${peerId} failed: ${cause.message}`);
    return { ok: false, error: new PairingTimedOutError(peerId, cause) };
  }

  private setState(peerId: string, state: PairingState): void {
    this.states.set(peerId, state);
    this.emit('state-changed', peerId, state);
  }
}
