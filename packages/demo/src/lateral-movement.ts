/**
 * Lateral Movement Demo
 * =====================
 *
 * Three defense nodes guard three network segments. An intruder scans the
 * east segment, brute-forces a host there, then moves west.
 *
 * - East correlates the scan into one incident, escalates and isolates.
 * - East gossips a signed summary of the closed incident.
 * - West sees the same source a few seconds later; peer corroboration
 *   pushes its score up before it has much local evidence.
 * - A forged summary from an impostor is rejected and costs the relay trust.
 *
 * Run:
 *   npm install
 *   npm run demo
 */

import {
  ActionHandler,
  DefenseNode,
  Ed25519Signer,
  FederationEnvelope,
  Outcome,
  ResponseAction,
  createMemoryMesh,
  setLogLevel,
} from "@bastion-mesh/core";

const INTRUDER = "10.0.0.66";

/**
 * Pretend enforcement point: prints what it would do
 */
class ConsoleEnforcer implements ActionHandler {
  constructor(private segment: string, private flakyFirstCall = false) {}

  async apply(action: ResponseAction, idempotencyKey: string): Promise<Outcome> {
    if (this.flakyFirstCall) {
      this.flakyFirstCall = false;
      return { status: "failed", reason: "switch API timeout", transient: true };
    }
    const target = "targetEntity" in action ? action.targetEntity : "-";
    console.log(`  [${this.segment}] ${action.kind} ${target} (key ${idempotencyKey})`);
    return { status: "success" };
  }
}

async function makeNodes() {
  const signers = await Promise.all([0, 1, 2].map(() => Ed25519Signer.generate()));
  const { mesh, transports } = createMemoryMesh(signers.map(s => s.nodeId));
  const names = ["east", "west", "core"];

  const nodes = signers.map((signer, i) => {
    const name = names[i] ?? `node-${i}`;
    const transport = transports[i];
    const enforcer = new ConsoleEnforcer(name, name === "east");
    return new DefenseNode({
      signer,
      transport,
      systemId: name,
      handlers: { isolate: enforcer, deceive: enforcer, block: enforcer },
      config: { windowMs: 30_000, gossipIntervalMs: 60_000, retryBaseDelayMs: 20 },
    });
  });

  return { mesh, nodes };
}

function scan(node: DefenseNode, at: number, count: number, prefix: string) {
  for (let i = 0; i < count; i++) {
    node.ingest({
      id: `${node.systemId}-${prefix}-${i}`,
      sourceEntity: INTRUDER,
      kind: "port_scan",
      timestamp: at + i * 200,
      attributes: { dest_ip: `${prefix}.${10 + i}`, port: String(22 + i) },
      confidence: 0.7 + i * 0.05,
    });
  }
}

async function main(): Promise<void> {
  setLogLevel("silent");
  const { nodes } = await makeNodes();
  const [east, west, core] = nodes;
  if (!east || !west || !core) throw new Error("mesh setup failed");

  for (const node of nodes) {
    node.setCallbacks({
      onDecision: (action, score) =>
        console.log(`  [${node.systemId}] decided ${action.kind} for incident ${action.incidentId}` +
          ` (score ${score?.value.toFixed(2) ?? "n/a"}, ${action.justification.reason})`),
    });
    node.start();
  }

  const t0 = Date.now();

  console.log("\nEAST: scan and brute force");
  console.log("--------------------------");
  scan(east, t0, 5, "10.1.0");
  east.ingest({
    id: "east-ssh-1",
    sourceEntity: INTRUDER,
    kind: "ssh_bruteforce",
    timestamp: t0 + 1_500,
    attributes: { targetEntity: "10.1.0.12" },
    confidence: 0.95,
  });
  await east.flush();

  const federation = east.federation;
  if (!federation) throw new Error("east has no federation");
  const published = await federation.publish();
  await new Promise(resolve => setImmediate(resolve));
  console.log(`\nEast published ${published?.incidentDigest.length ?? 0} incident digest(s)`);

  console.log("\nWEST: the same source shows up");
  console.log("------------------------------");
  scan(west, t0 + 4_000, 2, "10.2.0");
  await west.flush();

  const westIncident = west.correlator.openIncidents()[0] ?? west.correlator.closedIncidents()[0];
  if (westIncident) {
    console.log("\nWhy query (west):");
    console.log(JSON.stringify(west.explain(westIncident.id), null, 2));
  }

  console.log("\nCORE: a forged summary arrives");
  console.log("------------------------------");
  const forged: FederationEnvelope = {
    type: "FEDERATION_SUMMARY",
    from: west.id,
    hops: 1,
    message: {
      ...(published ?? {
        messageId: "forged",
        nodeId: east.id,
        sentAt: t0,
        incidentDigest: [],
        scoreSummary: { closedCount: 0, meanScore: 0, maxScore: 0 },
        signature: "00",
      }),
      messageId: "forged-1",
    },
  };
  const verdict = await core.federation?.handleEnvelope(forged);
  console.log(`  verdict: ${verdict ?? "no federation"}`);
  console.log(`  trust in west: ${core.trust.trust(west.id).toFixed(2)}`);

  for (const node of nodes) await node.stop();

  console.log("\nSummary");
  console.log("-------");
  for (const node of nodes) {
    const status = node.status();
    console.log(
      `- ${status.systemId}: processed ${status.metrics.eventsProcessed}, threats ${status.metrics.threatsDetected},` +
      ` closed ${status.incidents.closed}, budget ${status.budget.available}/${status.budget.capacity},` +
      ` audit ${node.audit.verify().valid ? "intact" : "BROKEN"}`
    );
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
