import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { SessionManager, type SessionManagerOptions, type SessionState } from '../src/session/session-manager.js';
import { FramedChannel } from '../src/session/channel.js';
import { MemoryNetwork } from '../src/transport/memory.js';
import type { TransportListener } from '../src/transport/types.js';
import { MemoryTrustStore, type TrustRecord } from '../src/trust/trust-store.js';
import { createEnvelope, isKind, type DecodedEnvelope, type DeviceInfoPayload } from '../src/message/envelope.js';
import type { LocalDevice } from '../src/identity/device.js';
import type { PeerRecord } from '../src/discovery/peer.js';
import { NotConnectedError, NotPairedError, PayloadTooLargeError, UnknownPeerError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';

const deviceA: LocalDevice = { id: 'lanlink-a', name: 'Laptop', kind: 'laptop', capabilities: ['ping', 'clipboard-sync'] };
const deviceB: LocalDevice = { id: 'lanlink-b', name: 'Desk', kind: 'desktop', capabilities: ['ping', 'clipboard-sync'] };

const ADDRESS_A = '10.0.0.1';
const ADDRESS_B = '10.0.0.2';

function trustFor(device: LocalDevice, credential?: string): TrustRecord {
  return {
    peerId: device.id,
    displayName: device.name,
    ...(credential !== undefined ? { credential } : {}),
    pairedAt: 1700000000000,
  };
}

function peerRecord(device: LocalDevice, address: string): PeerRecord {
  return {
    peerId: device.id,
    displayName: device.name,
    kind: device.kind,
    address,
    port: 1716,
    capabilities: [...device.capabilities],
    firstSeen: 0,
    lastSeen: 0,
  };
}

function tick(ms = 10): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function waitUntil(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await tick(5);
  }
}

interface TestPeer {
  manager: SessionManager;
  store: MemoryTrustStore;
  peers: Map<string, PeerRecord>;
  states: Array<[string, SessionState]>;
}

describe('SessionManager', () => {
  let network: MemoryNetwork;
  let managers: SessionManager[];
  let listeners: TransportListener[];

  async function createPeer(
    device: LocalDevice,
    address: string,
    trusted: TrustRecord[],
    options: Partial<SessionManagerOptions> = {},
  ): Promise<TestPeer> {
    const store = new MemoryTrustStore(trusted);
    const peers = new Map<string, PeerRecord>();
    const transport = network.createTransport(address);
    const manager = new SessionManager({
      local: device,
      transport,
      trustStore: store,
      peers: { getPeer: peerId => peers.get(peerId) },
      connectTimeoutMs: 1000,
      logger: silentLogger,
      ...options,
    });
    const states: Array<[string, SessionState]> = [];
    manager.on('state-changed', (peerId: string, state: SessionState) => states.push([peerId, state]));

    listeners.push(await transport.listen(1716, (stream, remote) => {
      const channel = new FramedChannel(stream, { remote });
      channel.firstEnvelope(1000)
        .then(async (envelope) => {
          if (isKind(envelope, 'device-info')) {
            await manager.acceptInbound(channel, envelope.payload);
          } else {
            channel.destroy();
          }
        })
        .catch(() => channel.destroy());
    }));
    managers.push(manager);
    return { manager, store, peers, states };
  }

  async function createPair(
    optionsA: Partial<SessionManagerOptions> = {},
    optionsB: Partial<SessionManagerOptions> = {},
  ): Promise<[TestPeer, TestPeer]> {
    const a = await createPeer(deviceA, ADDRESS_A, [trustFor(deviceB, 'test-secret')], optionsA);
    const b = await createPeer(deviceB, ADDRESS_B, [trustFor(deviceA, 'test-secret')], optionsB);
    a.peers.set(deviceB.id, peerRecord(deviceB, ADDRESS_B));
    b.peers.set(deviceA.id, peerRecord(deviceA, ADDRESS_A));
    return [a, b];
  }

  beforeEach(() => {
    network = new MemoryNetwork();
    managers = [];
    listeners = [];
  });

  afterEach(async () => {
    for (const manager of managers) {
      await manager.close();
    }
    for (const listener of listeners) {
      await listener.close();
    }
  });

  describe('connect', () => {
    it('should open a session both sides see as connected', async () => {
      const [a, b] = await createPair();

      await a.manager.connect(deviceB.id);
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'connected');

      assert.strictEqual(a.manager.sessionState(deviceB.id), 'connected');
      assert.deepStrictEqual(a.states, [[deviceB.id, 'connecting'], [deviceB.id, 'connected']]);
      assert.strictEqual(a.manager.getSession(deviceB.id)?.direction, 'outbound');
      assert.strictEqual(b.manager.getSession(deviceA.id)?.direction, 'inbound');
      assert.strictEqual(b.manager.getSession(deviceA.id)?.remote?.name, 'Laptop');
    });

    it('should learn the peer device info from the reply', async () => {
      const [a] = await createPair();
      const infos: DeviceInfoPayload[] = [];
      a.manager.on('peer-info', (_peerId: string, info: DeviceInfoPayload) => infos.push(info));

      await a.manager.connect(deviceB.id);
      await waitUntil(() => infos.length === 1);

      assert.deepStrictEqual(infos[0], {
        id: 'lanlink-b',
        name: 'Desk',
        deviceType: 'desktop',
        capabilities: ['ping', 'clipboard-sync'],
      });
    });

    it('should refuse to dial a peer that is not paired', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, []);
      a.peers.set(deviceB.id, peerRecord(deviceB, ADDRESS_B));

      await assert.rejects(a.manager.connect(deviceB.id), NotPairedError);
      assert.deepStrictEqual(a.states, []);
    });

    it('should fail for a trusted peer that has not been discovered', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, [trustFor(deviceB, 'test-secret')]);

      await assert.rejects(a.manager.connect(deviceB.id), UnknownPeerError);
      assert.strictEqual(a.manager.sessionState(deviceB.id), 'disconnected');
    });

    it('should be a no-op while already connected', async () => {
      const [a] = await createPair();
      await a.manager.connect(deviceB.id);
      await a.manager.connect(deviceB.id);

      assert.strictEqual(a.states.length, 2);
    });
  });

  describe('acceptInbound', () => {
    it('should refuse a peer presenting the wrong credential', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, [trustFor(deviceB, 'test-secret')]);
      const b = await createPeer(deviceB, ADDRESS_B, [trustFor(deviceA, 'other-secret')]);
      a.peers.set(deviceB.id, peerRecord(deviceB, ADDRESS_B));

      await a.manager.connect(deviceB.id);
      await waitUntil(() => a.manager.sessionState(deviceB.id) === 'disconnected');

      assert.strictEqual(b.manager.getSession(deviceA.id), undefined);
      await tick(30);
      assert.strictEqual(a.manager.sessionState(deviceB.id), 'disconnected');
    });

    it('should refuse a peer it does not trust', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, [trustFor(deviceB, 'test-secret')]);
      const b = await createPeer(deviceB, ADDRESS_B, []);
      a.peers.set(deviceB.id, peerRecord(deviceB, ADDRESS_B));

      await a.manager.connect(deviceB.id);
      await waitUntil(() => a.manager.sessionState(deviceB.id) === 'disconnected');

      assert.strictEqual(b.manager.sessionState(deviceA.id), 'disconnected');
    });

    it('should keep one session when both sides dial at once', async () => {
      const [a, b] = await createPair();

      await Promise.allSettled([a.manager.connect(deviceB.id), b.manager.connect(deviceA.id)]);
      await waitUntil(() =>
        a.manager.sessionState(deviceB.id) === 'connected' && b.manager.sessionState(deviceA.id) === 'connected',
      );
      await tick(30);

      assert.strictEqual(a.manager.sessionState(deviceB.id), 'connected');
      assert.strictEqual(b.manager.sessionState(deviceA.id), 'connected');
      assert.strictEqual(a.manager.getSession(deviceB.id)?.direction, 'outbound');
      assert.strictEqual(b.manager.getSession(deviceA.id)?.direction, 'inbound');

      const received: string[] = [];
      a.manager.registerHandler('clipboard-sync', payload => {
        received.push(payload.content);
      });
      assert.deepStrictEqual(await b.manager.send(deviceA.id, createEnvelope('clipboard-sync', { content: 'one' })), { ok: true });
      await waitUntil(() => received.length === 1);
      assert.deepStrictEqual(received, ['one']);
    });
  });

  describe('send', () => {
    it('should deliver to the registered handler in order', async () => {
      const [a, b] = await createPair();
      const received: string[] = [];
      b.manager.registerHandler('clipboard-sync', (payload, context) => {
        received.push(`${context.peerId}:${payload.content}`);
      });

      await a.manager.connect(deviceB.id);
      const results = await Promise.all(
        ['1', '2', '3'].map(content => a.manager.send(deviceB.id, createEnvelope('clipboard-sync', { content }))),
      );
      await waitUntil(() => received.length === 3);

      assert.deepStrictEqual(results, [{ ok: true }, { ok: true }, { ok: true }]);
      assert.deepStrictEqual(received, ['lanlink-a:1', 'lanlink-a:2', 'lanlink-a:3']);
    });

    it('should refuse an oversized envelope and keep the session', async () => {
      const [a, b] = await createPair({ maxFrameBytes: 512 });
      const received: string[] = [];
      b.manager.registerHandler('remote-command', (payload) => {
        received.push(payload.command);
      });

      await a.manager.connect(deviceB.id);
      const tooBig = await a.manager.send(deviceB.id, createEnvelope('remote-command', { command: 'type', args: ['x'.repeat(1000)] }));
      const small = await a.manager.send(deviceB.id, createEnvelope('remote-command', { command: 'lock', args: [] }));
      await waitUntil(() => received.length === 1);

      assert.ok(!tooBig.ok);
      assert.ok(tooBig.error instanceof PayloadTooLargeError);
      assert.deepStrictEqual(small, { ok: true });
      assert.deepStrictEqual(received, ['lock']);
      assert.strictEqual(a.manager.sessionState(deviceB.id), 'connected');
    });

    it('should return NotConnectedError without a session', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, []);

      const result = await a.manager.send(deviceB.id, createEnvelope('ping', {}));

      assert.ok(!result.ok);
      assert.ok(result.error instanceof NotConnectedError);
    });

    it('should report envelopes nobody handles', async () => {
      const [a, b] = await createPair();
      const unhandled: DecodedEnvelope[] = [];
      b.manager.on('unhandled-message', (_peerId: string, envelope: DecodedEnvelope) => unhandled.push(envelope));

      await a.manager.connect(deviceB.id);
      await a.manager.send(deviceB.id, createEnvelope('notification', { title: 't', body: 'b' }));
      await waitUntil(() => unhandled.length === 1);

      assert.deepStrictEqual(unhandled[0], { kind: 'notification', payload: { title: 't', body: 'b' } });
    });
  });

  it('should report unknown kinds and answer pings', async () => {
    const b = await createPeer(deviceB, ADDRESS_B, [trustFor(deviceA, 'test-secret')]);
    const unhandled: DecodedEnvelope[] = [];
    b.manager.on('unhandled-message', (_peerId: string, envelope: DecodedEnvelope) => unhandled.push(envelope));

    const stream = await network.createTransport(ADDRESS_A).dial({ address: ADDRESS_B, port: 1716 }, 1000);
    const raw = new FramedChannel(stream);
    await raw.send(createEnvelope('device-info', {
      id: deviceA.id,
      name: deviceA.name,
      deviceType: deviceA.kind,
      capabilities: deviceA.capabilities,
      credential: 'test-secret',
    }));
    await waitUntil(() => b.manager.sessionState(deviceA.id) === 'connected');

    stream.write('{"v":1,"kind":"hologram","payload":{}}\n');
    await waitUntil(() => unhandled.length === 1);
    const [first] = unhandled;
    assert.strictEqual(first.kind, 'unknown');
    assert.ok(first.kind === 'unknown' && first.rawKind === 'hologram');

    await raw.send(createEnvelope('ping', {}));
    const pong = await raw.waitFor(1000, envelope => (isKind(envelope, 'pong') ? envelope : undefined));
    assert.deepStrictEqual(pong, { kind: 'pong', payload: {} });
    raw.destroy();
  });

  describe('disconnect', () => {
    it('should close the peer side cleanly without reconnecting', async () => {
      const [a, b] = await createPair();
      await a.manager.connect(deviceB.id);
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'connected');

      await a.manager.disconnect(deviceB.id);
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'disconnected');
      await tick(30);

      assert.strictEqual(a.manager.sessionState(deviceB.id), 'disconnected');
      assert.strictEqual(b.manager.sessionState(deviceA.id), 'disconnected');
      assert.ok(!b.states.some(([, state]) => state === 'reconnecting'));
    });

    it('should tell peers on close', async () => {
      const [a, b] = await createPair();
      await a.manager.connect(deviceB.id);
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'connected');

      await a.manager.close();
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'disconnected');

      assert.deepStrictEqual(a.manager.listSessions(), []);
    });
  });

  describe('loss and reconnection', () => {
    it('should detect an idle peer and give up after the last attempt', async () => {
      const [a] = await createPair({
        idleTimeoutMs: 100,
        keepaliveIntervalMs: 30,
        reconnect: { initialDelayMs: 10, maxDelayMs: 20, maxAttempts: 2 },
      });
      const exhausted: string[] = [];
      a.manager.on('reconnect-exhausted', (peerId: string) => exhausted.push(peerId));

      await a.manager.connect(deviceB.id);
      network.setReachable(ADDRESS_A, false);
      await waitUntil(() => exhausted.length === 1);

      assert.deepStrictEqual(exhausted, [deviceB.id]);
      assert.strictEqual(a.manager.sessionState(deviceB.id), 'disconnected');
      assert.deepStrictEqual(a.states.map(([, state]) => state), [
        'connecting',
        'connected',
        'reconnecting',
        'connecting',
        'reconnecting',
        'connecting',
        'reconnecting',
        'disconnected',
      ]);
    });

    it('should retry at once when the lost peer is seen again', async () => {
      const [a, b] = await createPair({
        idleTimeoutMs: 100,
        keepaliveIntervalMs: 30,
        reconnect: { initialDelayMs: 10000 },
      });

      await a.manager.connect(deviceB.id);
      network.setReachable(ADDRESS_A, false);
      await waitUntil(() => a.manager.sessionState(deviceB.id) === 'reconnecting');

      network.setReachable(ADDRESS_A, true);
      await a.manager.handleDiscoveryEvent({ type: 'peer-updated', peer: peerRecord(deviceB, ADDRESS_B) });
      await waitUntil(() => a.manager.sessionState(deviceB.id) === 'connected');

      const received: string[] = [];
      b.manager.registerHandler('clipboard-sync', payload => {
        received.push(payload.content);
      });
      await a.manager.send(deviceB.id, createEnvelope('clipboard-sync', { content: 'back' }));
      await waitUntil(() => received.length === 1);
      assert.deepStrictEqual(received, ['back']);
    });

    it('should connect to a trusted peer when it appears', async () => {
      const [a, b] = await createPair();

      await a.manager.handleDiscoveryEvent({ type: 'peer-appeared', peer: peerRecord(deviceB, ADDRESS_B) });

      assert.strictEqual(a.manager.sessionState(deviceB.id), 'connected');
      await waitUntil(() => b.manager.sessionState(deviceA.id) === 'connected');
    });

    it('should ignore untrusted peers that appear', async () => {
      const a = await createPeer(deviceA, ADDRESS_A, []);
      a.peers.set(deviceB.id, peerRecord(deviceB, ADDRESS_B));

      await a.manager.handleDiscoveryEvent({ type: 'peer-appeared', peer: peerRecord(deviceB, ADDRESS_B) });

      assert.strictEqual(a.manager.getSession(deviceB.id), undefined);
    });
  });
});
