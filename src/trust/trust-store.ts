import { mkdir, open, readFile, rename } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { createLogger, type Logger } from '../logger.js';
import { isRecord } from '../message/schema.js';

/**
 * A peer we completed pairing with.
 */
export interface TrustRecord {
  peerId: string;
  displayName: string;
  /** Shared secret minted by the responder during pairing */
  credential?: string;
  /** Unix timestamp (ms) */
  pairedAt: number;
}

/**
 * Durable set of trusted peers. Every call is serialized against every other.
 */
export interface TrustStore {
  loadAll(): Promise<TrustRecord[]>;
  get(peerId: string): Promise<TrustRecord | undefined>;
  /** Insert or replace the record for `record.peerId` */
  upsert(record: TrustRecord): Promise<void>;
  /** @returns true if a record was removed */
  remove(peerId: string): Promise<boolean>;
  isTrusted(peerId: string): Promise<boolean>;
  clearAll(): Promise<void>;
}

export const TRUST_STORE_VERSION = 1;

/**
 * Default location: ~/.local/share/lanlink/trusted.json
 */
export function getDefaultTrustStorePath(): string {
  return join(homedir(), '.local', 'share', 'lanlink', 'trusted.json');
}

function parseTrustRecord(value: unknown): TrustRecord | null {
  if (!isRecord(value)) return null;
  const { peerId, displayName, credential, pairedAt } = value;
  if (typeof peerId !== 'string' || peerId === '' || typeof displayName !== 'string' || typeof pairedAt !== 'number') {
    return null;
  }
  if (credential !== undefined && typeof credential !== 'string') {
    return null;
  }
  return credential === undefined ? { peerId, displayName, pairedAt } : { peerId, displayName, credential, pairedAt };
}

/**
 * Runs tasks one at a time in submission order.
 */
class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task);
    this.tail = result.then(() => undefined, () => undefined);
    return result;
  }
}

/**
 * Trust store kept in memory only.
 */
export class MemoryTrustStore implements TrustStore {
  private records = new Map<string, TrustRecord>();
  private queue = new SerialQueue();

  constructor(initial: TrustRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.peerId, { ...record });
    }
  }

  loadAll(): Promise<TrustRecord[]> {
    return this.queue.run(async () => Array.from(this.records.values(), r => ({ ...r })));
  }

  get(peerId: string): Promise<TrustRecord | undefined> {
    return this.queue.run(async () => {
      const record = this.records.get(peerId);
      return record ? { ...record } : undefined;
    });
  }

  upsert(record: TrustRecord): Promise<void> {
    return this.queue.run(async () => {
      this.records.set(record.peerId, { ...record });
    });
  }

  remove(peerId: string): Promise<boolean> {
    return this.queue.run(async () => this.records.delete(peerId));
  }

  isTrusted(peerId: string): Promise<boolean> {
    return this.queue.run(async () => this.records.has(peerId));
  }

  clearAll(): Promise<void> {
    return this.queue.run(async () => {
      this.records.clear();
    });
  }
}

/**
 * Trust store persisted as one JSON document.
 *
 * Writes go to a temp file which is fsynced and renamed over the store, so a
 * crash leaves either the old or the new document on disk.
 */
export class FileTrustStore implements TrustStore {
  private path: string;
  private logger: Logger;
  private queue = new SerialQueue();
  private records: Map<string, TrustRecord> | null = null;

  constructor(path?: string, logger?: Logger) {
    this.path = path ?? getDefaultTrustStorePath();
    this.logger = logger ?? createLogger('trust');
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Re-read the file and return every record.
   */
  loadAll(): Promise<TrustRecord[]> {
    return this.queue.run(async () => {
      this.records = await this.read();
      return Array.from(this.records.values(), r => ({ ...r }));
    });
  }

  get(peerId: string): Promise<TrustRecord | undefined> {
    return this.queue.run(async () => {
      const record = (await this.loaded()).get(peerId);
      return record ? { ...record } : undefined;
    });
  }

  upsert(record: TrustRecord): Promise<void> {
    return this.queue.run(async () => {
      const records = new Map(await this.loaded());
      records.set(record.peerId, { ...record });
      await this.write(records);
      this.records = records;
    });
  }

  remove(peerId: string): Promise<boolean> {
    return this.queue.run(async () => {
      const records = new Map(await this.loaded());
      if (!records.delete(peerId)) {
        return false;
      }
      await this.write(records);
      this.records = records;
      return true;
    });
  }

  isTrusted(peerId: string): Promise<boolean> {
    return this.queue.run(async () => (await this.loaded()).has(peerId));
  }

  clearAll(): Promise<void> {
    return this.queue.run(async () => {
      const records = new Map<string, TrustRecord>();
      await this.write(records);
      this.records = records;
    });
  }

  private async loaded(): Promise<Map<string, TrustRecord>> {
    if (!this.records) {
      this.records = await this.read();
    }
    return this.records;
  }

  private async read(): Promise<Map<string, TrustRecord>> {
    const records = new Map<string, TrustRecord>();

    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
      if (code === 'ENOENT') {
        return records;
      }
      throw err;
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch {
      this.logger.warn(`trust store ${this.path} is not valid JSON; starting empty`);
      return records;
    }

    if (!isRecord(document) || !Array.isArray(document.peers)) {
      this.logger.warn(`trust store ${this.path} has an unexpected shape; starting empty`);
      return records;
    }

    for (const entry of document.peers) {
      const record = parseTrustRecord(entry);
      if (record) {
        records.set(record.peerId, record);
      } else {
        this.logger.warn(`skipping malformed trust record in ${this.path}`);
      }
    }
    return records;
  }

  private async write(records: Map<string, TrustRecord>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const content = JSON.stringify({ version: TRUST_STORE_VERSION, peers: [...records.values()] }, null, 2) + '\n';
    const tempPath = `${this.path}.${process.pid}.tmp`;

    const handle = await open(tempPath, 'w', 0o600);
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, this.path);
  }
}
