import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileTrustStore, MemoryTrustStore, type TrustRecord } from '../src/trust/trust-store.js';
import { silentLogger } from '../src/logger.js';

const phone: TrustRecord = { peerId: 'lanlink-phone', displayName: 'Phone', credential: 'test-secret', pairedAt: 1700000000000 };
const tablet: TrustRecord = { peerId: 'lanlink-tablet', displayName: 'Tablet', pairedAt: 1700000001000 };

describe('MemoryTrustStore', () => {
  it('should upsert, get and remove records', async () => {
    const store = new MemoryTrustStore();

    await store.upsert(phone);
    assert.deepStrictEqual(await store.get('lanlink-phone'), phone);
    assert.strictEqual(await store.isTrusted('lanlink-phone'), true);

    assert.strictEqual(await store.remove('lanlink-phone'), true);
    assert.strictEqual(await store.remove('lanlink-phone'), false);
    assert.strictEqual(await store.isTrusted('lanlink-phone'), false);
  });

  it('should replace a record for the same peer', async () => {
    const store = new MemoryTrustStore([phone]);

    await store.upsert({ ...phone, displayName: 'New Phone' });

    const all = await store.loadAll();
    assert.strictEqual(all.length, 1);
    assert.strictEqual(all[0].displayName, 'New Phone');
  });

  it('should clear every record', async () => {
    const store = new MemoryTrustStore([phone, tablet]);
    await store.clearAll();

    assert.deepStrictEqual(await store.loadAll(), []);
  });
});

describe('FileTrustStore', () => {
  let testDir: string;
  let storePath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'lanlink-trust-'));
    storePath = join(testDir, 'nested', 'trusted.json');
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('should start empty when the file does not exist', async () => {
    const store = new FileTrustStore(storePath, silentLogger);

    assert.deepStrictEqual(await store.loadAll(), []);
    assert.strictEqual(existsSync(storePath), false);
  });

  it('should persist records across instances', async () => {
    const first = new FileTrustStore(storePath, silentLogger);
    await first.upsert(phone);
    await first.upsert(tablet);

    const second = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await second.get('lanlink-phone'), phone);
    assert.deepStrictEqual(await second.get('lanlink-tablet'), tablet);
  });

  it('should write a versioned document readable only by the owner', async () => {
    const store = new FileTrustStore(storePath, silentLogger);
    await store.upsert(phone);

    const document: unknown = JSON.parse(readFileSync(storePath, 'utf-8'));
    assert.deepStrictEqual(document, { version: 1, peers: [phone] });
    assert.strictEqual(statSync(storePath).mode & 0o777, 0o600);
    assert.strictEqual(existsSync(`${storePath}.${process.pid}.tmp`), false);
  });

  it('should persist removal', async () => {
    const store = new FileTrustStore(storePath, silentLogger);
    await store.upsert(phone);
    await store.upsert(tablet);

    assert.strictEqual(await store.remove('lanlink-phone'), true);
    assert.strictEqual(await store.remove('lanlink-phone'), false);

    const reopened = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await reopened.loadAll(), [tablet]);
  });

  it('should persist clearAll', async () => {
    const store = new FileTrustStore(storePath, silentLogger);
    await store.upsert(phone);
    await store.clearAll();

    const reopened = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await reopened.loadAll(), []);
  });

  it('should serialize concurrent writes', async () => {
    const store = new FileTrustStore(storePath, silentLogger);

    await Promise.all([
      store.upsert(phone),
      store.upsert(tablet),
      store.upsert({ ...phone, displayName: 'Phone 2' }),
    ]);

    const reopened = new FileTrustStore(storePath, silentLogger);
    const records = await reopened.loadAll();
    assert.deepStrictEqual(records.map(r => [r.peerId, r.displayName]), [
      ['lanlink-phone', 'Phone 2'],
      ['lanlink-tablet', 'Tablet'],
    ]);
  });

  it('should start empty when the file is not valid JSON', async () => {
    mkdirSync(join(testDir, 'nested'), { recursive: true });
    writeFileSync(storePath, '{broken');

    const store = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await store.loadAll(), []);
  });

  it('should skip malformed entries', async () => {
    mkdirSync(join(testDir, 'nested'), { recursive: true });
    writeFileSync(storePath, JSON.stringify({ version: 1, peers: [phone, { peerId: 42 }, 'nope'] }));

    const store = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await store.loadAll(), [phone]);
  });

  it('should see changes made by another instance on loadAll', async () => {
    const reader = new FileTrustStore(storePath, silentLogger);
    assert.deepStrictEqual(await reader.loadAll(), []);

    await new FileTrustStore(storePath, silentLogger).upsert(phone);

    assert.deepStrictEqual(await reader.loadAll(), [phone]);
  });
});
