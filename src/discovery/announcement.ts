import { isDeviceKind, type DeviceKind } from '../identity/device.js';
import { isRecord } from '../message/schema.js';

export const ANNOUNCEMENT_SERVICE = 'lanlink';
export const ANNOUNCEMENT_VERSION = 1;

/** Largest datagram we are willing to send or parse */
export const MAX_ANNOUNCEMENT_BYTES = 8192;

/**
 * What a peer advertises about itself. Derived entirely from PeerRecord fields.
 */
export interface AdvertisedDevice {
  id: string;
  name: string;
  kind: DeviceKind;
  port: number;
  capabilities: string[];
}

/**
 * One multicast datagram.
 * - `announce`: presence (periodic, or in answer to a query)
 * - `withdraw`: the sender stops advertising
 * - `query`: ask advertisers to announce now
 */
export type Announcement =
  | { type: 'announce'; device: AdvertisedDevice }
  | { type: 'withdraw'; id: string }
  | { type: 'query'; id: string };

export type ParseAnnouncementResult =
  | { ok: true; announcement: Announcement }
  | { ok: false; reason: string };

export function encodeAnnouncement(announcement: Announcement): Buffer {
  const base = { service: ANNOUNCEMENT_SERVICE, version: ANNOUNCEMENT_VERSION, type: announcement.type };
  if (announcement.type === 'announce') {
    const { device } = announcement;
    return Buffer.from(JSON.stringify({
      ...base,
      id: device.id,
      name: device.name,
      deviceType: device.kind,
      port: device.port,
      capabilities: device.capabilities,
    }));
  }
  return Buffer.from(JSON.stringify({ ...base, id: announcement.id }));
}

/**
 * Parse a datagram. Never throws: malformed input yields `{ ok: false, reason }`.
 */
export function parseAnnouncement(data: Buffer): ParseAnnouncementResult {
  if (data.length > MAX_ANNOUNCEMENT_BYTES) {
    return { ok: false, reason: 'too_large' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data.toString('utf-8'));
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (!isRecord(parsed) || parsed.service !== ANNOUNCEMENT_SERVICE) {
    return { ok: false, reason: 'foreign_service' };
  }
  if (typeof parsed.version !== 'number' || parsed.version < 1) {
    return { ok: false, reason: 'invalid_version' };
  }
  if (typeof parsed.id !== 'string' || parsed.id === '') {
    return { ok: false, reason: 'missing_id' };
  }

  switch (parsed.type) {
    case 'withdraw':
      return { ok: true, announcement: { type: 'withdraw', id: parsed.id } };
    case 'query':
      return { ok: true, announcement: { type: 'query', id: parsed.id } };
    case 'announce': {
      const { name, deviceType, port, capabilities } = parsed;
      if (typeof name !== 'string') {
        return { ok: false, reason: 'missing_name' };
      }
      if (!isDeviceKind(deviceType)) {
        return { ok: false, reason: 'invalid_device_type' };
      }
      if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
        return { ok: false, reason: 'invalid_port' };
      }
      if (!Array.isArray(capabilities)) {
        return { ok: false, reason: 'invalid_capabilities' };
      }
      const tags = capabilities.filter((c): c is string => typeof c === 'string');
      if (tags.length !== capabilities.length) {
        return { ok: false, reason: 'invalid_capabilities' };
      }
      return {
        ok: true,
        announcement: {
          type: 'announce',
          device: { id: parsed.id, name, kind: deviceType, port, capabilities: tags },
        },
      };
    }
    default:
      return { ok: false, reason: 'unknown_type' };
  }
}
