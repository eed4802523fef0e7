/**
 * Logged Transport
 * ================
 *
 * Wrapper that records federation traffic in the audit log.
 */

import { FederationEnvelope, FederationTransport, NodeId } from '../types/index.js';
import { AuditLog } from '../audit/log.js';

type Handler = (envelope: FederationEnvelope) => void;

function summary(envelope: FederationEnvelope): Record<string, unknown> {
  return {
    messageId: envelope.message.messageId,
    origin: envelope.message.nodeId,
    from: envelope.from,
    hops: envelope.hops,
    digests: envelope.message.incidentDigest.length,
  };
}

export class LoggedTransport implements FederationTransport {
  constructor(
    private inner: FederationTransport,
    private audit: AuditLog
  ) {}

  get id(): NodeId {
    return this.inner.id;
  }

  send(to: NodeId, envelope: FederationEnvelope): void {
    this.inner.send(to, envelope);
    this.audit.append('FED_OUT', { to, ...summary(envelope) });
  }

  onMessage(handler: Handler): void {
    this.inner.onMessage(envelope => {
      this.audit.append('FED_IN', summary(envelope));
      handler(envelope);
    });
  }

  peers(): NodeId[] {
    return this.inner.peers();
  }
}

/**
 * Wrap a transport with logging
 */
export function withLogging(transport: FederationTransport, audit: AuditLog): LoggedTransport {
  return new LoggedTransport(transport, audit);
}
