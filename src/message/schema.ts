import { DEVICE_KINDS } from '../identity/device.js';
import { DecodeError } from '../errors.js';
import type { MessageKind, PayloadMap } from './envelope.js';

type FieldType = 'string' | 'number' | 'integer' | 'boolean' | 'string[]' | 'bytes';

interface FieldSpec {
  type: FieldType;
  optional?: boolean;
  /** Allowed values for string fields */
  oneOf?: readonly string[];
  min?: number;
  max?: number;
}

const KEY_ACTIONS = ['press', 'release'] as const;
const MOUSE_ACTIONS = ['move', 'press', 'release', 'scroll'] as const;
const MOUSE_BUTTONS = ['left', 'right', 'middle'] as const;
const MEDIA_ACTIONS = ['play', 'pause', 'play-pause', 'next', 'previous', 'volume-up', 'volume-down', 'toggle-mute'] as const;
const SLIDE_ACTIONS = ['next-slide', 'previous-slide', 'start-presentation', 'end-presentation'] as const;

const deviceFields = {
  id: { type: 'string' },
  name: { type: 'string' },
  deviceType: { type: 'string', oneOf: DEVICE_KINDS },
  capabilities: { type: 'string[]' },
} satisfies Record<string, FieldSpec>;

const SCHEMAS = {
  'ping': {},
  'pong': {},
  'device-info': { ...deviceFields, credential: { type: 'string', optional: true } },
  'pairing-request': { ...deviceFields, proof: { type: 'string', optional: true } },
  'pairing-accepted': {
    peerId: { type: 'string' },
    reason: { type: 'string', optional: true },
    credential: { type: 'string', optional: true },
  },
  'pairing-rejected': { peerId: { type: 'string' }, reason: { type: 'string', optional: true } },
  'disconnect': { reason: { type: 'string', optional: true } },
  'clipboard-sync': { content: { type: 'string' } },
  'request-clipboard': {},
  'file-transfer-request': { fileName: { type: 'string' }, fileSize: { type: 'integer', min: 0 } },
  'file-transfer-chunk': {
    fileName: { type: 'string' },
    chunk: { type: 'bytes' },
    offset: { type: 'integer', min: 0 },
  },
  'file-transfer-end': { fileName: { type: 'string' } },
  'file-transfer-error': { fileName: { type: 'string' }, error: { type: 'string' } },
  'key-event': { action: { type: 'string', oneOf: KEY_ACTIONS }, code: { type: 'string' } },
  'mouse-event': {
    action: { type: 'string', oneOf: MOUSE_ACTIONS },
    x: { type: 'number' },
    y: { type: 'number' },
    button: { type: 'string', oneOf: MOUSE_BUTTONS, optional: true },
    scrollDelta: { type: 'number', optional: true },
  },
  'touchpad-event': {
    x: { type: 'number' },
    y: { type: 'number' },
    dx: { type: 'number' },
    dy: { type: 'number' },
    scrollDeltaX: { type: 'number' },
    scrollDeltaY: { type: 'number' },
    isLeftClick: { type: 'boolean' },
    isRightClick: { type: 'boolean' },
  },
  'notification': {
    title: { type: 'string' },
    body: { type: 'string' },
    appName: { type: 'string', optional: true },
  },
  'media-control': { action: { type: 'string', oneOf: MEDIA_ACTIONS } },
  'battery-status': { charge: { type: 'number', min: 0, max: 100 }, isCharging: { type: 'boolean' } },
  'remote-command': { command: { type: 'string' }, args: { type: 'string[]' } },
  'slide-control': { action: { type: 'string', oneOf: SLIDE_ACTIONS } },
} satisfies { [K in MessageKind]: { [F in keyof PayloadMap[K]]-?: FieldSpec } };

const PAYLOAD_SCHEMAS: Record<MessageKind, Readonly<Record<string, FieldSpec>>> = SCHEMAS;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** fileName -> file_name */
export function toWireKey(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/** file_name -> fileName */
export function fromWireKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, c: string) => c.toUpperCase());
}

/**
 * Convert a payload to its wire form: snake_case keys, bytes as base64.
 */
export function payloadToWire(payload: object): Record<string, unknown> {
  const entries: Array<[string, unknown]> = Object.entries(payload);
  const wire: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    wire[toWireKey(key)] = value instanceof Uint8Array ? Buffer.from(value).toString('base64') : value;
  }
  return wire;
}

function checkField(kind: MessageKind, field: string, rule: FieldSpec, value: unknown): string | null {
  const where = `${kind}.${toWireKey(field)}`;
  switch (rule.type) {
    case 'string':
      if (typeof value !== 'string') return `${where} must be a string`;
      if (rule.oneOf && !rule.oneOf.includes(value)) return `${where} has unsupported value "${value}"`;
      return null;
    case 'boolean':
      return typeof value === 'boolean' ? null : `${where} must be a boolean`;
    case 'number':
    case 'integer': {
      if (typeof value !== 'number' || !Number.isFinite(value)) return `${where} must be a number`;
      if (rule.type === 'integer' && !Number.isSafeInteger(value)) return `${where} must be an integer`;
      if (rule.min !== undefined && value < rule.min) return `${where} must be >= ${rule.min}`;
      if (rule.max !== undefined && value > rule.max) return `${where} must be <= ${rule.max}`;
      return null;
    }
    case 'string[]':
      return Array.isArray(value) && value.every(item => typeof item === 'string')
        ? null
        : `${where} must be an array of strings`;
    case 'bytes':
      return value instanceof Uint8Array ? null : `${where} must be base64 bytes`;
  }
}

/**
 * Throw a DecodeError unless `value` matches the payload schema of `kind`.
 */
export function assertPayload<K extends MessageKind>(
  kind: K,
  value: Record<string, unknown>,
): asserts value is Record<string, unknown> & PayloadMap[K] {
  for (const [field, rule] of Object.entries(PAYLOAD_SCHEMAS[kind])) {
    const fieldValue = value[field];
    if (fieldValue === undefined) {
      if (rule.optional) continue;
      throw new DecodeError(`${kind}.${toWireKey(field)} is required`);
    }
    const problem = checkField(kind, field, rule, fieldValue);
    if (problem) {
      throw new DecodeError(problem);
    }
  }
}

/**
 * Read a wire payload into its typed form.
 * Unknown extra fields are ignored so additive protocol changes stay compatible.
 */
export function payloadFromWire<K extends MessageKind>(kind: K, wire: unknown): PayloadMap[K] {
  const source = wire === undefined ? {} : wire;
  if (!isRecord(source)) {
    throw new DecodeError(`${kind} payload must be an object`);
  }

  const payload: Record<string, unknown> = {};
  for (const [field, rule] of Object.entries(PAYLOAD_SCHEMAS[kind])) {
    const value = source[toWireKey(field)];
    if (value === undefined || value === null) continue;
    if (rule.type === 'bytes') {
      if (typeof value !== 'string' || !BASE64.test(value)) {
        throw new DecodeError(`${kind}.${toWireKey(field)} must be base64 bytes`);
      }
      payload[field] = new Uint8Array(Buffer.from(value, 'base64'));
    } else {
      payload[field] = value;
    }
  }

  assertPayload(kind, payload);
  return payload;
}
