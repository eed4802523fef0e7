/**
 * Memory Transport
 * ================
 *
 * In-process federation transport for tests and the demo. All nodes share
 * a mesh; links between nodes can be cut and healed to simulate network
 * partitions. A send over a cut link throws, like a refused connection.
 */

import { FederationEnvelope, FederationTransport, NodeId } from '../types/index.js';

type Handler = (envelope: FederationEnvelope) => void;

function linkKey(a: NodeId, b: NodeId): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export class MemoryMesh {
  private transports = new Map<NodeId, MemoryTransport>();
  private cut = new Set<string>();
  private delivered = 0;

  register(transport: MemoryTransport): void {
    this.transports.set(transport.id, transport);
  }

  send(from: NodeId, to: NodeId, envelope: FederationEnvelope): void {
    const target = this.transports.get(to);
    if (!target || to === from) {
      throw new Error(`Peer ${to.slice(0, 8)} is not on the mesh`);
    }
    if (this.cut.has(linkKey(from, to))) {
      throw new Error(`Link ${from.slice(0, 8)} -> ${to.slice(0, 8)} is down`);
    }
    this.delivered++;
    target.deliver(envelope);
  }

  /**
   * Cut every link between the two groups
   */
  partition(groupA: NodeId[], groupB: NodeId[]): void {
    for (const a of groupA) {
      for (const b of groupB) {
        if (a !== b) this.cut.add(linkKey(a, b));
      }
    }
  }

  /**
   * Restore all links
   */
  heal(): void {
    this.cut.clear();
  }

  isLinked(a: NodeId, b: NodeId): boolean {
    return this.transports.has(a) && this.transports.has(b) && !this.cut.has(linkKey(a, b));
  }

  peers(): NodeId[] {
    return Array.from(this.transports.keys());
  }

  get deliveredCount(): number {
    return this.delivered;
  }
}

export class MemoryTransport implements FederationTransport {
  private handlers: Handler[] = [];

  constructor(
    public readonly id: NodeId,
    private mesh: MemoryMesh
  ) {
    mesh.register(this);
  }

  send(to: NodeId, envelope: FederationEnvelope): void {
    this.mesh.send(this.id, to, envelope);
  }

  onMessage(handler: Handler): void {
    this.handlers.push(handler);
  }

  deliver(envelope: FederationEnvelope): void {
    for (const h of this.handlers) {
      h(envelope);
    }
  }

  /**
   * Every other node on the mesh, reachable or not
   */
  peers(): NodeId[] {
    return this.mesh.peers().filter(p => p !== this.id);
  }
}

/**
 * Create a mesh with one connected transport per node id
 */
export function createMemoryMesh(ids: NodeId[]): {
  mesh: MemoryMesh;
  transports: MemoryTransport[];
} {
  const mesh = new MemoryMesh();
  const transports = ids.map(id => new MemoryTransport(id, mesh));
  return { mesh, transports };
}
