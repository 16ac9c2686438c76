import { randomBytes, randomUUID } from 'node:crypto';
import { hostname } from 'node:os';

/**
 * Peer category. A presentation hint only.
 */
export type DeviceKind = 'desktop' | 'laptop' | 'phone' | 'tablet';

export const DEVICE_KINDS: readonly DeviceKind[] = ['desktop', 'laptop', 'phone', 'tablet'];

/**
 * Identity this node presents on the network.
 */
export interface LocalDevice {
  /** Stable identifier, unique per installation */
  id: string;
  /** Human-readable name */
  name: string;
  kind: DeviceKind;
  /** Message kinds this device can handle */
  capabilities: string[];
}

export function isDeviceKind(value: unknown): value is DeviceKind {
  return typeof value === 'string' && DEVICE_KINDS.some(kind => kind === value);
}

/**
 * Generate a new installation id.
 */
export function generateDeviceId(): string {
  return `lanlink-${randomUUID()}`;
}

/**
 * Default display name derived from the host name.
 */
export function defaultDeviceName(): string {
  return hostname() || 'lanlink device';
}

/**
 * Mint an opaque credential proving a completed pairing (32 random bytes, hex).
 */
export function generateCredential(): string {
  return randomBytes(32).toString('hex');
}
