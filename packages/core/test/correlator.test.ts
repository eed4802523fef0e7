import {
  Correlator,
  Signal,
  IncidentState,
  ClosedIncidentError,
  InvalidTransitionError,
} from '../src/index.js';

function signal(
  id: string,
  sourceEntity: string,
  timestamp: number,
  attributes: Record<string, string | string[]> = {},
  confidence = 0.8
): Signal {
  return { id, sourceEntity, kind: 'probe', timestamp, attributes, confidence };
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  const out: T[][] = [];
  items.forEach((item, i) => {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const p of permutations(rest)) out.push([item, ...p]);
  });
  return out;
}

describe('Correlator windowing', () => {
  it('should group signals within the window and split those outside it', async () => {
    const correlator = new Correlator({ windowMs: 5 });

    const first = await correlator.attach(signal('S1', 'entityA', 0, {}, 0.9));
    const second = await correlator.attach(signal('S2', 'entityA', 2, {}, 0.8));
    const third = await correlator.attach(signal('S3', 'entityA', 20));

    expect(second.id).toBe(first.id);
    expect(Array.from(second.memberSignalIds).sort()).toEqual(['S1', 'S2']);
    expect(third.id).not.toBe(first.id);
    expect(Array.from(third.memberSignalIds)).toEqual(['S3']);
  });

  it('should extend firstSeen, lastSeen and entities on attach', async () => {
    const correlator = new Correlator({ windowMs: 10 });

    await correlator.attach(signal('s1', 'host-a', 100, { targetEntity: 'db-1' }));
    const incident = await correlator.attach(signal('s2', 'db-1', 95));

    expect(incident.firstSeen).toBe(95);
    expect(incident.lastSeen).toBe(100);
    expect(Array.from(incident.affectedEntities).sort()).toEqual(['db-1', 'host-a']);
    expect(incident.version).toBe(2);
  });

  it('should not correlate unrelated entities', async () => {
    const correlator = new Correlator({ windowMs: 60 });
    const a = await correlator.attach(signal('s1', 'host-a', 0));
    const b = await correlator.attach(signal('s2', 'host-b', 1));
    expect(a.id).not.toBe(b.id);
    expect(correlator.openCount).toBe(2);
  });

  it('should return the existing incident for a signal seen before', async () => {
    const correlator = new Correlator();
    const first = await correlator.attach(signal('s1', 'host-a', 0));
    const again = await correlator.attach(signal('s1', 'host-a', 0));
    expect(again.id).toBe(first.id);
    expect(again.memberSignalIds.size).toBe(1);
  });
});

describe('Correlator merging', () => {
  it('should merge two incidents touched by one signal into the lower id', async () => {
    const correlator = new Correlator({ windowMs: 10 });
    const merges: Array<[number, number[]]> = [];
    correlator.setCallbacks({ onMerged: (survivor, absorbed) => merges.push([survivor.id, absorbed]) });

    const a = await correlator.attach(signal('s1', 'host-a', 0));
    const b = await correlator.attach(signal('s2', 'host-b', 1));
    const merged = await correlator.attach(signal('s3', 'host-a', 2, { targetEntity: 'host-b' }));

    expect(merged.id).toBe(Math.min(a.id, b.id));
    expect(Array.from(merged.memberSignalIds).sort()).toEqual(['s1', 's2', 's3']);
    expect(merges).toEqual([[a.id, [b.id]]]);
    expect(correlator.resolve(b.id)).toBe(a.id);
    expect(correlator.get(b.id)?.id).toBe(a.id);
    expect(correlator.openCount).toBe(1);
  });

  it('should produce the same partition for every arrival order of a batch', async () => {
    const batch = [
      signal('p1', 'host-a', 10),
      signal('p2', 'host-b', 11),
      signal('p3', 'host-c', 12, { targetEntity: 'host-b' }),
      signal('p4', 'host-d', 13, { dest_ip: ['host-a', 'host-c'] }),
      signal('p5', 'host-e', 14),
    ];

    const partitions = new Set<string>();
    for (const order of permutations(batch)) {
      const correlator = new Correlator({ windowMs: 30 });
      const incidents = await correlator.attachBatch(order);
      partitions.add(JSON.stringify(incidents.map(i => Array.from(i.memberSignalIds).sort())));
    }

    expect(partitions.size).toBe(1);
    expect(Array.from(partitions)[0]).toBe(JSON.stringify([['p1', 'p2', 'p3', 'p4'], ['p5']]));
  });

  it('should assign every accepted signal to exactly one incident', async () => {
    const correlator = new Correlator({ windowMs: 5 });
    const signals = [
      signal('q1', 'h1', 0),
      signal('q2', 'h2', 1, { targetEntity: 'h1' }),
      signal('q3', 'h3', 30),
      signal('q4', 'h2', 31, { targetEntity: 'h3' }),
      signal('q5', 'h4', 60),
    ];
    for (const s of signals) await correlator.attach(s);

    const owners = new Map<string, number>();
    for (const incident of correlator.openIncidents()) {
      for (const id of incident.memberSignalIds) {
        expect(owners.has(id)).toBe(false);
        owners.set(id, incident.id);
      }
    }
    expect(Array.from(owners.keys()).sort()).toEqual(['q1', 'q2', 'q3', 'q4', 'q5']);
    for (const s of signals) {
      expect(correlator.incidentOf(s.id)?.id).toBe(owners.get(s.id));
    }
  });

  it('should survive concurrent merges without deadlock', async () => {
    const correlator = new Correlator({ windowMs: 100 });
    await correlator.attach(signal('c1', 'n1', 0));
    await correlator.attach(signal('c2', 'n2', 0));
    await correlator.attach(signal('c3', 'n3', 0));

    const results = await Promise.all([
      correlator.attach(signal('c4', 'n1', 1, { targetEntity: 'n2' })),
      correlator.attach(signal('c5', 'n3', 1, { targetEntity: 'n2' })),
      correlator.attach(signal('c6', 'n3', 1, { targetEntity: 'n1' })),
    ]);

    const ids = new Set(results.map(r => correlator.resolve(r.id)));
    expect(ids).toEqual(new Set([1]));
    expect(correlator.get(1)?.memberSignalIds.size).toBe(6);
    expect(correlator.openCount).toBe(1);
  });
});

describe('Correlator lifecycle', () => {
  it('should close incidents whose window has passed', async () => {
    const correlator = new Correlator({ windowMs: 5 });
    const first = await correlator.attach(signal('S1', 'entityA', 0));
    await correlator.attach(signal('S2', 'entityA', 2));
    const later = await correlator.attach(signal('S3', 'entityA', 20));

    const closed = await correlator.sweep(20);

    expect(closed.map(i => i.id)).toEqual([first.id]);
    expect(closed[0]?.state).toBe(IncidentState.CLOSED);
    expect(closed[0]?.closeReason).toBe('window_expired');
    expect(correlator.get(later.id)?.state).toBe(IncidentState.OPEN);
  });

  it('should keep closed incidents immutable', async () => {
    const correlator = new Correlator({ windowMs: 5 });
    const incident = await correlator.attach(signal('i1', 'host-a', 0));
    await correlator.close(incident.id, 'terminal_action');

    const closed = correlator.get(incident.id);
    expect(closed?.state).toBe(IncidentState.CLOSED);
    expect(Object.isFrozen(closed)).toBe(true);

    // A new signal for the same entity opens a fresh incident
    const fresh = await correlator.attach(signal('i2', 'host-a', 1));
    expect(fresh.id).not.toBe(incident.id);
    expect(correlator.get(incident.id)?.memberSignalIds.size).toBe(1);

    expect(() => correlator.transition(incident.id, IncidentState.EVALUATED)).toThrow(ClosedIncidentError);
  });

  it('should enforce lifecycle transitions', async () => {
    const correlator = new Correlator();
    const incident = await correlator.attach(signal('t1', 'host-a', 0));

    expect(() => correlator.transition(incident.id, IncidentState.ACTIONED)).toThrow(InvalidTransitionError);
    expect(correlator.transition(incident.id, IncidentState.EVALUATED).state).toBe(IncidentState.EVALUATED);
    expect(correlator.transition(incident.id, IncidentState.ACTIONED).state).toBe(IncidentState.ACTIONED);
    expect(correlator.transition(incident.id, IncidentState.EVALUATED).state).toBe(IncidentState.EVALUATED);
    expect(() => correlator.transition(incident.id, IncidentState.CLOSED)).toThrow(InvalidTransitionError);
  });

  it('should hold the incident lock while running withIncident', async () => {
    const correlator = new Correlator();
    const incident = await correlator.attach(signal('l1', 'host-a', 0));

    let lockedInside = false;
    await correlator.withIncident(incident.id, () => {
      lockedInside = correlator.isLocked(incident.id);
    });

    expect(lockedInside).toBe(true);
    expect(correlator.isLocked(incident.id)).toBe(false);
  });

  it('should close everything on shutdown', async () => {
    const correlator = new Correlator();
    await correlator.attach(signal('z1', 'host-a', 0));
    await correlator.attach(signal('z2', 'host-b', 0));

    const closed = await correlator.closeAll('shutdown');
    expect(closed.map(i => i.closeReason)).toEqual(['shutdown', 'shutdown']);
    expect(correlator.openCount).toBe(0);
    expect(correlator.closedCount).toBe(2);
  });
});
