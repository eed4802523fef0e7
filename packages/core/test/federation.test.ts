import { bytesToHex } from '@noble/hashes/utils';
import {
  FederationCoordinator,
  TrustStore,
  ThreatIntelStore,
  FaultLog,
  Ed25519Signer,
  SignatureCapability,
  signMessage,
  verifyMessage,
  hashEntity,
  summarize,
  createMemoryMesh,
  FederationEnvelope,
  FederationMessage,
  FederationTransport,
  Incident,
  IncidentState,
  NodeId,
  Signal,
} from '../src/index.js';

/**
 * Deterministic stand-in for Ed25519: the signature spells out signer and digest
 */
class TestSigner implements SignatureCapability {
  constructor(readonly nodeId: NodeId) {}

  async sign(bytes: Uint8Array): Promise<string> {
    return `${this.nodeId}:${bytesToHex(bytes)}`;
  }

  async verify(bytes: Uint8Array, signature: string, nodeId: NodeId): Promise<boolean> {
    return signature === `${nodeId}:${bytesToHex(bytes)}`;
  }
}

class CaptureTransport implements FederationTransport {
  sent: Array<{ to: NodeId; envelope: FederationEnvelope }> = [];
  private handler: (envelope: FederationEnvelope) => void = () => undefined;

  constructor(readonly id: NodeId, private others: NodeId[]) {}

  send(to: NodeId, envelope: FederationEnvelope): void {
    this.sent.push({ to, envelope });
  }

  onMessage(handler: (envelope: FederationEnvelope) => void): void {
    this.handler = handler;
  }

  peers(): NodeId[] {
    return this.others;
  }

  deliver(envelope: FederationEnvelope): void {
    this.handler(envelope);
  }
}

function closedIncident(id: number, entities: string[]): { incident: Incident; members: Signal[] } {
  const members = entities.map((e, i) => ({
    id: `sig-${id}-${i}`,
    sourceEntity: e,
    kind: 'port_scan',
    timestamp: 100 + i,
    attributes: {},
    confidence: 0.9,
  }));
  const incident: Incident = {
    id,
    memberSignalIds: new Set(members.map(m => m.id)),
    firstSeen: 100,
    lastSeen: 100 + entities.length - 1,
    affectedEntities: new Set(entities),
    state: IncidentState.CLOSED,
    version: entities.length,
    closeReason: 'window_expired',
  };
  return { incident, members };
}

function coordinator(transport: FederationTransport, options: { faults?: FaultLog } = {}): FederationCoordinator {
  return new FederationCoordinator(
    transport,
    new TestSigner(transport.id),
    new TrustStore(),
    new ThreatIntelStore(),
    { faults: options.faults, random: () => 0 }
  );
}

// Verification in the coordinator is async; let every pending continuation run
const settle = () => new Promise<void>(resolve => setImmediate(resolve));

async function signedBy(nodeId: NodeId, entities: string[], peakScore: number): Promise<FederationMessage> {
  const digest = {
    incidentId: 1,
    entityHashes: entities.map(hashEntity).sort(),
    kinds: ['port_scan'],
    signalCount: 1,
    firstSeen: 0,
    lastSeen: 0,
    peakScore,
  };
  return signMessage(
    { messageId: `${nodeId}-1`, nodeId, sentAt: 0, incidentDigest: [digest], scoreSummary: summarize([digest]) },
    new TestSigner(nodeId)
  );
}

function envelope(message: FederationMessage, from: NodeId, hops = 1): FederationEnvelope {
  return { type: 'FEDERATION_SUMMARY', from, hops, message };
}

describe('Federation publishing', () => {
  it('should publish nothing when no incident closed', async () => {
    const transport = new CaptureTransport('node-a', ['node-b']);
    const fed = coordinator(transport);

    expect(await fed.publish(1_000)).toBeNull();
    expect(transport.sent).toHaveLength(0);
  });

  it('should sign hashed digests and clear the pending list', async () => {
    const transport = new CaptureTransport('node-a', ['node-b']);
    const fed = coordinator(transport);
    const { incident, members } = closedIncident(3, ['host-y', 'host-x']);
    fed.noteClosed(incident, members, 0.8);

    const message = await fed.publish(1_000);

    expect(message?.messageId).toBe('node-a-1-1000');
    expect(message?.incidentDigest[0]?.entityHashes).toEqual([hashEntity('host-x'), hashEntity('host-y')]);
    expect(message?.incidentDigest[0]?.kinds).toEqual(['port_scan']);
    expect(message?.scoreSummary).toEqual({ closedCount: 1, meanScore: 0.8, maxScore: 0.8 });
    expect(JSON.stringify(message)).not.toContain('host-x');
    expect(fed.pendingCount).toBe(0);
    expect(transport.sent.map(s => [s.to, s.envelope.hops])).toEqual([['node-b', 4]]);
  });

  it('should send to at most gossipFanout peers', async () => {
    const transport = new CaptureTransport('node-a', ['p1', 'p2', 'p3', 'p4', 'p5']);
    const fed = new FederationCoordinator(
      transport,
      new TestSigner('node-a'),
      new TrustStore(),
      new ThreatIntelStore(),
      { config: { gossipFanout: 2 }, random: () => 0 }
    );
    const { incident, members } = closedIncident(1, ['host-x']);
    fed.noteClosed(incident, members, 0.5);

    await fed.publish(1_000);

    expect(transport.sent.map(s => s.to)).toEqual(['p2', 'p3']);
  });
});

describe('Federation receiving', () => {
  it('should accept a verified message and index it by entity hash', async () => {
    const fed = coordinator(new CaptureTransport('node-b', []));
    const message = await signedBy('node-a', ['host-x'], 0.8);

    expect(await fed.handleEnvelope(envelope(message, 'node-a'), 0)).toBe('accepted');
    expect(fed.trust.trust('node-a')).toBeCloseTo(0.52);
    expect(fed.intel.corroboration(['host-x'], 0)).toBeCloseTo(0.416);
    expect(fed.intel.reporters(['host-x'], 0)).toEqual(['node-a']);
  });

  it('should discard a message with a bad signature and distrust the relay', async () => {
    const faults = new FaultLog();
    const fed = coordinator(new CaptureTransport('node-b', []), { faults });
    const genuine = await signedBy('node-a', ['host-x'], 0.2);
    const digest = genuine.incidentDigest[0];
    if (!digest) throw new Error('missing digest');
    const tampered: FederationMessage = { ...genuine, incidentDigest: [{ ...digest, peakScore: 1 }] };
    const rejected: string[] = [];
    fed.setCallbacks({ onRejected: (_env, from, reason) => rejected.push(`${from}: ${reason}`) });

    const verdict = await fed.handleEnvelope(envelope(tampered, 'node-c'), 0);

    expect(verdict).toBe('rejected');
    expect(rejected).toEqual(['node-c: signature verification failed']);
    expect(fed.trust.trust('node-c')).toBeCloseTo(0.3);
    expect(fed.trust.get('node-a')).toBeUndefined();
    expect(fed.intel.size).toBe(0);
    expect(fed.intel.corroboration(['host-x'], 0)).toBe(0);
    expect(faults.count('VerificationFailed')).toBe(1);
    expect(fed.getStats().rejected).toBe(1);
  });

  it('should still accept the genuine message after a tampered copy of it', async () => {
    const fed = coordinator(new CaptureTransport('node-b', []));
    const genuine = await signedBy('node-a', ['host-x'], 0.8);
    const digest = genuine.incidentDigest[0];
    if (!digest) throw new Error('missing digest');
    // Same id and signature, different body
    const tampered: FederationMessage = { ...genuine, incidentDigest: [{ ...digest, peakScore: 0.1 }] };

    expect(await fed.handleEnvelope(envelope(tampered, 'node-c'), 0)).toBe('rejected');
    expect(await fed.handleEnvelope(envelope(genuine, 'node-a'), 0)).toBe('accepted');
    expect(await fed.handleEnvelope(envelope(tampered, 'node-c'), 0)).toBe('duplicate');

    expect(fed.intel.corroboration(['host-x'], 0)).toBeCloseTo(0.416);
    expect(fed.getStats()).toMatchObject({ accepted: 1, rejected: 1, duplicates: 1 });
  });

  it('should reject malformed envelopes without touching trust', async () => {
    const fed = coordinator(new CaptureTransport('node-b', []));

    const verdict = await fed.handleEnvelope({ type: 'HELLO', from: 'node-z' }, 0);

    expect(verdict).toBe('rejected');
    expect(fed.trust.get('node-z')).toBeUndefined();
    expect(fed.getStats().rejected).toBe(1);
  });

  it('should drop duplicates and its own messages', async () => {
    const transport = new CaptureTransport('node-b', []);
    const fed = coordinator(transport);
    const message = await signedBy('node-a', ['host-x'], 0.5);
    const own = await signedBy('node-b', ['host-y'], 0.5);

    expect(await fed.handleEnvelope(envelope(message, 'node-a'), 0)).toBe('accepted');
    expect(await fed.handleEnvelope(envelope(message, 'node-c'), 0)).toBe('duplicate');
    expect(await fed.handleEnvelope(envelope(own, 'node-c'), 0)).toBe('duplicate');
    expect(fed.getStats()).toMatchObject({ accepted: 1, duplicates: 2 });
    expect(fed.trust.get('node-a')?.accepted).toBe(1);
  });

  it('should forward with one fewer hop, skipping sender and origin', async () => {
    const transport = new CaptureTransport('node-b', ['node-a', 'node-c', 'node-d']);
    const fed = coordinator(transport);
    const message = await signedBy('node-a', ['host-x'], 0.5);

    await fed.handleEnvelope(envelope(message, 'node-d', 3), 0);

    expect(transport.sent.map(s => [s.to, s.envelope.from, s.envelope.hops])).toEqual([['node-c', 'node-b', 2]]);
    expect(fed.getStats().forwarded).toBe(1);
  });

  it('should not forward a message on its last hop', async () => {
    const transport = new CaptureTransport('node-b', ['node-c']);
    const fed = coordinator(transport);

    await fed.handleEnvelope(envelope(await signedBy('node-a', ['host-x'], 0.5), 'node-a', 1), 0);

    expect(transport.sent).toHaveLength(0);
  });
});

describe('Federation over a mesh', () => {
  it('should spread a summary to every node', async () => {
    const { transports } = createMemoryMesh(['node-a', 'node-b', 'node-c']);
    const [a, b, c] = transports.map(t => coordinator(t));
    if (!a || !b || !c) throw new Error('mesh setup failed');
    const { incident, members } = closedIncident(1, ['host-x']);
    a.noteClosed(incident, members, 0.8);

    const message = await a.publish(1_000);
    await settle();

    expect(message).not.toBeNull();
    expect(b.intel.reporters(['host-x'])).toEqual(['node-a']);
    expect(c.intel.reporters(['host-x'])).toEqual(['node-a']);
    // Each relays to the other, who has already seen it
    expect(b.getStats()).toMatchObject({ accepted: 1, duplicates: 1 });
    expect(c.getStats()).toMatchObject({ accepted: 1, duplicates: 1 });
  });

  it('should replay missed summaries once a partitioned peer is heard again', async () => {
    const { mesh, transports } = createMemoryMesh(['node-a', 'node-b', 'node-c']);
    const [a, b, c] = transports.map(t => coordinator(t));
    if (!a || !b || !c) throw new Error('mesh setup failed');

    mesh.partition(['node-a', 'node-b'], ['node-c']);
    const first = closedIncident(1, ['host-x']);
    a.noteClosed(first.incident, first.members, 0.9);
    await a.publish(1_000);
    await settle();

    expect(a.unreachablePeers()).toEqual(['node-c']);
    expect(a.getStats().sendFailures).toBe(1);
    expect(b.intel.reporters(['host-x'])).toEqual(['node-a']);
    expect(c.intel.reporters(['host-x'])).toEqual([]);

    mesh.heal();
    const second = closedIncident(2, ['host-y']);
    c.noteClosed(second.incident, second.members, 0.4);
    await c.publish(2_000);
    await settle();

    expect(a.unreachablePeers()).toEqual([]);
    expect(a.getStats().replayed).toBe(1);
    expect(c.intel.reporters(['host-x'])).toEqual(['node-a']);
    expect(a.intel.reporters(['host-y'])).toEqual(['node-c']);
  });
});

describe('Memory mesh', () => {
  it('should refuse sends across a cut link until healed', () => {
    const { mesh, transports } = createMemoryMesh(['n1', 'n2']);
    const [t1, t2] = transports;
    if (!t1 || !t2) throw new Error('mesh setup failed');
    const received: string[] = [];
    t2.onMessage(e => received.push(e.from));
    const env: FederationEnvelope = {
      type: 'FEDERATION_SUMMARY',
      from: 'n1',
      hops: 1,
      message: {
        messageId: 'm1',
        nodeId: 'n1',
        sentAt: 0,
        incidentDigest: [],
        scoreSummary: { closedCount: 0, meanScore: 0, maxScore: 0 },
        signature: 'test-signature',
      },
    };

    mesh.partition(['n1'], ['n2']);
    expect(mesh.isLinked('n1', 'n2')).toBe(false);
    expect(() => t1.send('n2', env)).toThrow('Link n1 -> n2 is down');

    mesh.heal();
    t1.send('n2', env);
    expect(received).toEqual(['n1']);
    expect(mesh.deliveredCount).toBe(1);
    expect(() => t1.send('n3', env)).toThrow('Peer n3 is not on the mesh');
    expect(t1.peers()).toEqual(['n2']);
  });
});

describe('Threat intel', () => {
  it('should combine peer contributions as 1 - product of misses', async () => {
    const intel = new ThreatIntelStore();
    intel.record(await signedBy('p1', ['host-x'], 0.8), 0.5, 0);
    intel.record(await signedBy('p2', ['host-x'], 0.5), 1, 0);

    // 1 - (1 - 0.4) * (1 - 0.5)
    expect(intel.corroboration(['host-x'], 0)).toBeCloseTo(0.7);
  });

  it('should count a peer once across entities', async () => {
    const intel = new ThreatIntelStore();
    intel.record(await signedBy('p1', ['host-x', 'host-y'], 0.6), 1, 0);

    expect(intel.corroboration(['host-x', 'host-y'], 0)).toBeCloseTo(0.6);
  });

  it('should forget reports older than the TTL', async () => {
    const intel = new ThreatIntelStore({ corroborationTtlMs: 1_000 });
    intel.record(await signedBy('p1', ['host-x'], 0.8), 1, 0);

    expect(intel.corroboration(['host-x'], 1_000)).toBeCloseTo(0.8);
    expect(intel.corroboration(['host-x'], 1_001)).toBe(0);
    expect(intel.prune(1_001)).toBe(1);
    expect(intel.size).toBe(0);
  });
});

describe('Peer trust', () => {
  it('should rise slowly, fall fast and stay within [0, 1]', () => {
    const trust = new TrustStore({ newPeerTrust: 0.5 });

    expect(trust.trust('peer')).toBe(0.5);
    trust.recordAccepted('peer', 0);
    trust.recordAccepted('peer', 0);
    trust.recordAccepted('peer', 0);
    expect(trust.trust('peer')).toBeCloseTo(0.56);

    trust.recordRejected('peer', 0);
    expect(trust.trust('peer')).toBeCloseTo(0.36);

    trust.recordRejected('peer', 0);
    trust.recordRejected('peer', 0);
    expect(trust.trust('peer')).toBe(0);
  });

  it('should list the most trusted peers first', () => {
    const trust = new TrustStore();
    trust.recordRejected('bad', 0);
    trust.recordAccepted('good', 0);
    trust.track('new', 0);

    expect(trust.getAll().map(t => t.nodeId)).toEqual(['good', 'new', 'bad']);
  });

  it('should prune peers not heard from', () => {
    const trust = new TrustStore();
    trust.track('old', 0);
    trust.track('recent', 900);

    expect(trust.prune(500, 1_000)).toEqual(['old']);
    expect(trust.get('recent')).toBeDefined();
  });
});

describe('Ed25519 signatures', () => {
  it('should verify its own messages and reject tampering', async () => {
    const signer = await Ed25519Signer.generate();
    const other = await Ed25519Signer.generate();
    const message = await signMessage(
      {
        messageId: 'm1',
        nodeId: signer.nodeId,
        sentAt: 5,
        incidentDigest: [],
        scoreSummary: { closedCount: 0, meanScore: 0, maxScore: 0 },
      },
      signer
    );

    expect(signer.nodeId).toMatch(/^[0-9a-f]{64}$/);
    expect(await verifyMessage(message, other)).toBe(true);
    expect(await verifyMessage({ ...message, sentAt: 6 }, other)).toBe(false);
    expect(await verifyMessage({ ...message, nodeId: other.nodeId }, other)).toBe(false);
    expect(await verifyMessage({ ...message, signature: 'not-hex' }, other)).toBe(false);
  });
});
