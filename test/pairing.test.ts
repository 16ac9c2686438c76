import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import {
  PairingCoordinator,
  type PairingCoordinatorOptions,
  type PairingDecision,
  type PairingRequest,
  type PairingRole,
} from '../src/pairing/coordinator.js';
import { PairingKey } from '../src/pairing/pairing-key.js';
import { FramedChannel } from '../src/session/channel.js';
import { MemoryNetwork } from '../src/transport/memory.js';
import type { TransportListener } from '../src/transport/types.js';
import { MemoryTrustStore, type TrustRecord } from '../src/trust/trust-store.js';
import { isKind } from '../src/message/envelope.js';
import type { LocalDevice } from '../src/identity/device.js';
import type { PeerRecord } from '../src/discovery/peer.js';
import {
  PairingAlreadyInProgressError,
  PairingRejectedError,
  PairingTimedOutError,
} from '../src/errors.js';
import { silentLogger } from '../src/logger.js';

const deviceA: LocalDevice = { id: 'lanlink-a', name: 'Initiator', kind: 'laptop', capabilities: ['ping', 'clipboard-sync'] };
const deviceB: LocalDevice = { id: 'lanlink-b', name: 'Responder', kind: 'desktop', capabilities: ['ping'] };

const peerB: PeerRecord = {
  peerId: 'lanlink-b',
  displayName: 'Responder',
  kind: 'desktop',
  address: '10.0.0.1',
  port: 1716,
  capabilities: ['ping'],
  firstSeen: 0,
  lastSeen: 0,
};

interface Handoff {
  peerId: string;
  role: PairingRole;
  channel: FramedChannel;
}

interface Side {
  coordinator: PairingCoordinator;
  store: MemoryTrustStore;
  handoffs: Handoff[];
}

class FailingTrustStore extends MemoryTrustStore {
  override upsert(): Promise<void> {
    return Promise.reject(new Error('disk full'));
  }
}

function tick(ms = 10): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('PairingCoordinator', () => {
  let network: MemoryNetwork;
  let listeners: TransportListener[];
  let sides: Side[];

  function createSide(device: LocalDevice, address: string, options: Partial<PairingCoordinatorOptions> = {}): Side {
    const store = new MemoryTrustStore();
    const handoffs: Handoff[] = [];
    const coordinator = new PairingCoordinator({
      local: device,
      transport: network.createTransport(address),
      trustStore: store,
      timeoutMs: 1000,
      logger: silentLogger,
      onPaired: (peerId, channel, role) => {
        handoffs.push({ peerId, channel, role });
      },
      ...options,
    });
    const side = { coordinator, store, handoffs };
    sides.push(side);
    return side;
  }

  async function serve(side: Side, address: string): Promise<void> {
    const listener = await network.createTransport(address).listen(1716, (stream, remote) => {
      const channel = new FramedChannel(stream, { remote });
      channel.firstEnvelope(1000)
        .then(async (envelope) => {
          if (isKind(envelope, 'pairing-request')) {
            await side.coordinator.handleRequest(channel, envelope.payload, remote);
          }
        })
        .catch(() => channel.destroy());
    });
    listeners.push(listener);
  }

  beforeEach(() => {
    network = new MemoryNetwork();
    listeners = [];
    sides = [];
  });

  afterEach(async () => {
    for (const side of sides) {
      for (const handoff of side.handoffs) {
        handoff.channel.destroy();
      }
    }
    for (const listener of listeners) {
      await listener.close();
    }
  });

  it('should pair when the initiator presents the responder code', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1', { pairingKey: new PairingKey('123456') });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB, '123456');
    await tick();

    assert.ok(result.ok);
    assert.strictEqual(result.record.peerId, 'lanlink-b');
    assert.strictEqual(result.record.displayName, 'Responder');
    assert.match(result.record.credential ?? '', /^[0-9a-f]{64}$/);

    const stored = await b.store.get('lanlink-a');
    assert.strictEqual(stored?.displayName, 'Initiator');
    assert.strictEqual(stored?.credential, result.record.credential);
    assert.deepStrictEqual(await a.store.get('lanlink-b'), result.record);

    assert.deepStrictEqual(a.handoffs.map(h => [h.peerId, h.role]), [['lanlink-b', 'initiator']]);
    assert.deepStrictEqual(b.handoffs.map(h => [h.peerId, h.role]), [['lanlink-a', 'responder']]);
    assert.strictEqual(a.handoffs[0].channel.isOpen(), true);
    assert.strictEqual(a.coordinator.pairingState('lanlink-b'), 'accepted');
    assert.strictEqual(b.coordinator.pairingState('lanlink-a'), 'accepted');
  });

  it('should emit paired on both sides', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1', { autoAccept: true });
    await serve(b, '10.0.0.1');
    const events: string[] = [];
    a.coordinator.on('paired', (record: TrustRecord, role: PairingRole) => events.push(`a:${record.peerId}:${role}`));
    b.coordinator.on('paired', (record: TrustRecord, role: PairingRole) => events.push(`b:${record.peerId}:${role}`));

    await a.coordinator.initiatePairing(peerB);
    await tick();

    assert.deepStrictEqual(events, ['b:lanlink-a:responder', 'a:lanlink-b:initiator']);
  });

  it('should rotate the code after a successful pairing', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const key = new PairingKey('123456');
    const b = createSide(deviceB, '10.0.0.1', { pairingKey: key });
    await serve(b, '10.0.0.1');
    let rotations = 0;
    const rotate = key.rotate.bind(key);
    key.rotate = () => {
      rotations++;
      return rotate();
    };

    await a.coordinator.initiatePairing(peerB, '123456');
    await tick();

    assert.strictEqual(rotations, 1);
    assert.strictEqual(b.coordinator.pairingCode(), key.current());
  });

  it('should reject a wrong code and store nothing', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1', { pairingKey: new PairingKey('123456') });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB, '000000');

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingRejectedError);
    assert.strictEqual(result.error.message, 'Pairing rejected by lanlink-b: invalid pairing code');
    assert.deepStrictEqual(await a.store.loadAll(), []);
    assert.deepStrictEqual(await b.store.loadAll(), []);
    assert.strictEqual(a.coordinator.pairingState('lanlink-b'), 'rejected');
  });

  it('should reject a request without a code', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1');
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingRejectedError);
    assert.strictEqual(result.error.reason, 'pairing code required');
  });

  it('should hand the request to a custom approver', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const requests: PairingRequest[] = [];
    const b = createSide(deviceB, '10.0.0.1', {
      approver: (request) => {
        requests.push(request);
        return { accept: false, reason: 'not now' };
      },
    });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB, 'hello');

    assert.ok(!result.ok);
    assert.strictEqual(result.error.message, 'Pairing rejected by lanlink-b: not now');
    assert.strictEqual(requests.length, 1);
    assert.strictEqual(requests[0].peerId, 'lanlink-a');
    assert.strictEqual(requests[0].displayName, 'Initiator');
    assert.strictEqual(requests[0].kind, 'laptop');
    assert.deepStrictEqual(requests[0].capabilities, ['ping', 'clipboard-sync']);
    assert.strictEqual(requests[0].proof, 'hello');
    assert.strictEqual(requests[0].remote?.address, '10.0.0.2');
  });

  it('should reject when the approver does not decide in time', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1', {
      timeoutMs: 50,
      approver: () => new Promise<PairingDecision>(() => {}),
    });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingRejectedError);
    assert.strictEqual(result.error.reason, 'approval timed out');
  });

  it('should time out when the peer never answers', async () => {
    const a = createSide(deviceA, '10.0.0.2', { timeoutMs: 50 });
    listeners.push(await network.createTransport('10.0.0.1').listen(1716, () => {}));

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingTimedOutError);
    assert.strictEqual(result.error.message, 'Pairing with lanlink-b timed out');
    assert.strictEqual(a.coordinator.pairingState('lanlink-b'), 'timed-out');
    assert.strictEqual(a.coordinator.isPairing('lanlink-b'), false);
  });

  it('should time out when the peer cannot be reached', async () => {
    const a = createSide(deviceA, '10.0.0.2');

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingTimedOutError);
  });

  it('should refuse a second pairing with the same peer while one is running', async () => {
    const a = createSide(deviceA, '10.0.0.2', { timeoutMs: 50 });
    listeners.push(await network.createTransport('10.0.0.1').listen(1716, () => {}));

    const first = a.coordinator.initiatePairing(peerB);
    const second = await a.coordinator.initiatePairing(peerB);

    assert.ok(!second.ok);
    assert.ok(second.error instanceof PairingAlreadyInProgressError);
    assert.strictEqual((await first).ok, false);
  });

  it('should reject a concurrent request from a peer already being paired', async () => {
    let release: (decision: PairingDecision) => void = () => {};
    const b = createSide(deviceB, '10.0.0.1', {
      approver: () => new Promise<PairingDecision>((resolve) => {
        release = resolve;
      }),
    });
    await serve(b, '10.0.0.1');
    const a = createSide(deviceA, '10.0.0.2');
    const aAgain = createSide(deviceA, '10.0.0.3');

    const first = a.coordinator.initiatePairing(peerB);
    await tick(20);
    const second = await aAgain.coordinator.initiatePairing(peerB);
    release({ accept: true });

    assert.ok(!second.ok);
    assert.ok(second.error instanceof PairingRejectedError);
    assert.strictEqual(second.error.reason, 'pairing already in progress');
    assert.strictEqual((await first).ok, true);
  });

  it('should ignore a malformed frame before the answer', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    listeners.push(await network.createTransport('10.0.0.1').listen(1716, (stream) => {
      stream.once('data', () => {
        stream.write('{"kind":"clipboard-sync","payload":{}}\n');
        stream.write('{"v":1,"kind":"pairing-accepted","payload":{"peer_id":"lanlink-b","credential":"test-secret"}}\n');
      });
    }));

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(result.ok);
    assert.strictEqual(result.record.credential, 'test-secret');
    assert.deepStrictEqual(a.handoffs.map(h => h.peerId), ['lanlink-b']);
  });

  it('should refuse an acceptance sent by a different device', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    listeners.push(await network.createTransport('10.0.0.1').listen(1716, (stream) => {
      stream.once('data', () => {
        stream.write('{"v":1,"kind":"pairing-accepted","payload":{"peer_id":"lanlink-impostor","credential":"test-secret"}}\n');
      });
    }));

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingRejectedError);
    assert.strictEqual(result.error.reason, 'answered by lanlink-impostor');
    assert.deepStrictEqual(await a.store.loadAll(), []);
    assert.strictEqual(a.handoffs.length, 0);
    assert.strictEqual(a.coordinator.pairingState('lanlink-b'), 'rejected');
  });

  it('should fail without a session when the initiator cannot store the pairing', async () => {
    const a = createSide(deviceA, '10.0.0.2', { trustStore: new FailingTrustStore() });
    const b = createSide(deviceB, '10.0.0.1', { autoAccept: true });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingTimedOutError);
    assert.strictEqual(a.handoffs.length, 0);
    assert.strictEqual(a.coordinator.pairingState('lanlink-b'), 'timed-out');
    assert.strictEqual(a.coordinator.isPairing('lanlink-b'), false);
  });

  it('should reject the request when the responder cannot store the pairing', async () => {
    const a = createSide(deviceA, '10.0.0.2');
    const b = createSide(deviceB, '10.0.0.1', { autoAccept: true, trustStore: new FailingTrustStore() });
    await serve(b, '10.0.0.1');

    const result = await a.coordinator.initiatePairing(peerB);
    await tick();

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingRejectedError);
    assert.strictEqual(result.error.reason, 'could not store pairing');
    assert.strictEqual(b.handoffs.length, 0);
    assert.strictEqual(b.coordinator.pairingState('lanlink-a'), 'timed-out');
  });

  it('should abort a pairing in progress when closed', async () => {
    let release: (decision: PairingDecision) => void = () => {};
    const b = createSide(deviceB, '10.0.0.1', {
      approver: () => new Promise<PairingDecision>((resolve) => {
        release = resolve;
      }),
    });
    await serve(b, '10.0.0.1');
    const a = createSide(deviceA, '10.0.0.2');

    const pending = a.coordinator.initiatePairing(peerB);
    await tick(20);
    a.coordinator.close();
    const result = await pending;
    release({ accept: true });
    await tick(20);

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingTimedOutError);
    assert.strictEqual(a.coordinator.isPairing('lanlink-b'), false);
    assert.deepStrictEqual(await a.store.loadAll(), []);
    assert.deepStrictEqual(await b.store.loadAll(), []);
    assert.strictEqual(a.handoffs.length, 0);
    assert.strictEqual(b.handoffs.length, 0);
  });

  it('should answer a waiting request and refuse new pairings once closed', async () => {
    const b = createSide(deviceB, '10.0.0.1', {
      approver: () => new Promise<PairingDecision>(() => {}),
    });
    await serve(b, '10.0.0.1');
    const a = createSide(deviceA, '10.0.0.2');

    const pending = a.coordinator.initiatePairing(peerB);
    await tick(20);
    b.coordinator.close();
    const result = await pending;
    await tick();

    assert.ok(!result.ok);
    assert.ok(result.error instanceof PairingTimedOutError);
    assert.strictEqual(b.coordinator.pairingState('lanlink-a'), 'rejected');
    assert.strictEqual(b.coordinator.isPairing('lanlink-a'), false);

    const after = await b.coordinator.initiatePairing({ ...peerB, peerId: 'lanlink-a', address: '10.0.0.2' });
    assert.ok(!after.ok);
    assert.ok(after.error instanceof PairingTimedOutError);
  });
});
