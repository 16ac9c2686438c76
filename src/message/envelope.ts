import type { DeviceKind } from '../identity/device.js';

/**
 * Every message kind understood by this protocol version.
 */
export const MESSAGE_KINDS = [
  'ping',
  'pong',
  'device-info',
  'pairing-request',
  'pairing-accepted',
  'pairing-rejected',
  'disconnect',
  'clipboard-sync',
  'request-clipboard',
  'file-transfer-request',
  'file-transfer-chunk',
  'file-transfer-end',
  'file-transfer-error',
  'key-event',
  'mouse-event',
  'touchpad-event',
  'notification',
  'media-control',
  'battery-status',
  'remote-command',
  'slide-control',
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

const KNOWN_KINDS = new Set<string>(MESSAGE_KINDS);

export function isMessageKind(value: string): value is MessageKind {
  return KNOWN_KINDS.has(value);
}

export type EmptyPayload = Record<string, never>;

export interface DeviceInfoPayload {
  id: string;
  name: string;
  deviceType: DeviceKind;
  capabilities: string[];
  /** Credential from a previous pairing, presented when opening a session */
  credential?: string;
}

export interface PairingRequestPayload {
  id: string;
  name: string;
  deviceType: DeviceKind;
  capabilities: string[];
  /** Optional proof, e.g. a user-entered pairing code */
  proof?: string;
}

export interface PairingAcceptedPayload {
  peerId: string;
  reason?: string;
  credential?: string;
}

export interface PairingRejectedPayload {
  peerId: string;
  reason?: string;
}

export type KeyAction = 'press' | 'release';
export type MouseAction = 'move' | 'press' | 'release' | 'scroll';
export type MouseButton = 'left' | 'right' | 'middle';
export type MediaAction =
  | 'play'
  | 'pause'
  | 'play-pause'
  | 'next'
  | 'previous'
  | 'volume-up'
  | 'volume-down'
  | 'toggle-mute';
export type SlideAction = 'next-slide' | 'previous-slide' | 'start-presentation' | 'end-presentation';

/**
 * Payload shape for each message kind.
 */
export interface PayloadMap {
  'ping': EmptyPayload;
  'pong': EmptyPayload;
  'device-info': DeviceInfoPayload;
  'pairing-request': PairingRequestPayload;
  'pairing-accepted': PairingAcceptedPayload;
  'pairing-rejected': PairingRejectedPayload;
  'disconnect': { reason?: string };
  'clipboard-sync': { content: string };
  'request-clipboard': EmptyPayload;
  'file-transfer-request': { fileName: string; fileSize: number };
  'file-transfer-chunk': { fileName: string; chunk: Uint8Array; offset: number };
  'file-transfer-end': { fileName: string };
  'file-transfer-error': { fileName: string; error: string };
  'key-event': { action: KeyAction; code: string };
  'mouse-event': { action: MouseAction; x: number; y: number; button?: MouseButton; scrollDelta?: number };
  'touchpad-event': {
    x: number;
    y: number;
    dx: number;
    dy: number;
    scrollDeltaX: number;
    scrollDeltaY: number;
    isLeftClick: boolean;
    isRightClick: boolean;
  };
  'notification': { title: string; body: string; appName?: string };
  'media-control': { action: MediaAction };
  'battery-status': { charge: number; isCharging: boolean };
  'remote-command': { command: string; args: string[] };
  'slide-control': { action: SlideAction };
}

/**
 * The wire unit: a closed kind tag plus the payload that kind determines.
 */
export interface Envelope<K extends MessageKind = MessageKind> {
  kind: K;
  payload: PayloadMap[K];
}

export type EnvelopeMap = { [K in MessageKind]: Envelope<K> };

/**
 * Any known envelope, discriminated by `kind`.
 */
export type AnyEnvelope = EnvelopeMap[MessageKind];

/**
 * A well-formed frame whose kind this version does not know.
 * Kept so newer peers do not break older ones.
 */
export interface UnknownEnvelope {
  kind: 'unknown';
  rawKind: string;
  raw: unknown;
}

export type DecodedEnvelope = AnyEnvelope | UnknownEnvelope;

/**
 * Build an envelope of the given kind.
 */
export function createEnvelope<K extends MessageKind>(kind: K, payload: PayloadMap[K]): EnvelopeMap[K] {
  return { kind, payload };
}

/**
 * Narrow an envelope to a specific kind.
 */
export function isKind<K extends MessageKind>(envelope: DecodedEnvelope, kind: K): envelope is EnvelopeMap[K] {
  return envelope.kind === kind;
}
