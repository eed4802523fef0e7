import {
  PolicyEngine,
  ResourceBudget,
  compilePolicySet,
  selectRule,
  canTransition,
  DEFAULT_POLICY,
  PolicyConfigError,
  ClosedIncidentError,
  Incident,
  IncidentState,
  PolicySetInput,
  Signal,
  ThreatScore,
} from '../src/index.js';

function incident(id = 1, state = IncidentState.OPEN): Incident {
  return {
    id,
    memberSignalIds: new Set(['s1', 's2']),
    firstSeen: 0,
    lastSeen: 2,
    affectedEntities: new Set(['host-a', 'host-b']),
    state,
    version: 2,
  };
}

function score(value: number, incidentId = 1): ThreatScore {
  return {
    id: `score-${incidentId}-${value}`,
    incidentId,
    incidentVersion: 2,
    value,
    contributingFactors: [],
    computedAt: 0,
    degraded: false,
  };
}

function member(id: string, sourceEntity: string, kind = 'probe'): Signal {
  return { id, sourceEntity, kind, timestamp: 0, attributes: {}, confidence: 0.9 };
}

// Example policy: R1 covers the top band with isolate or block at cost 3
const EXAMPLE: PolicySetInput = {
  version: 'test-1',
  rules: [
    { id: 'R0', minSeverity: 0, maxSeverity: 0.9, allowedActions: ['noaction'], resourceCost: 0, legalConstraintTag: 'standard' },
    { id: 'R1', minSeverity: 0.9, maxSeverity: 1, allowedActions: ['isolate', 'block'], resourceCost: 3, legalConstraintTag: 'standard' },
  ],
};

describe('Policy rule loading', () => {
  it('should load the default policy', () => {
    const policy = compilePolicySet(DEFAULT_POLICY);
    expect(policy.rules.map(r => r.id)).toEqual(['R1', 'R2', 'R3', 'R4']);
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it('should reject a gap in coverage', () => {
    expect(() => compilePolicySet({
      version: 'gap',
      rules: [
        { id: 'A', minSeverity: 0, maxSeverity: 0.4, allowedActions: ['noaction'], resourceCost: 0, legalConstraintTag: 'standard' },
        { id: 'B', minSeverity: 0.5, maxSeverity: 1, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
      ],
    })).toThrow('Severity gap between 0.4 and 0.5');
  });

  it('should reject rules that do not reach 1', () => {
    expect(() => compilePolicySet({
      version: 'short',
      rules: [
        { id: 'A', minSeverity: 0, maxSeverity: 0.8, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
      ],
    })).toThrow('No rule covers severity above 0.8');
  });

  it('should reject duplicate ids and inverted ranges', () => {
    expect(() => compilePolicySet({
      version: 'dup',
      rules: [
        { id: 'A', minSeverity: 0, maxSeverity: 1, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
        { id: 'A', minSeverity: 0, maxSeverity: 1, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
      ],
    })).toThrow(PolicyConfigError);

    expect(() => compilePolicySet({
      version: 'inverted',
      rules: [
        { id: 'A', minSeverity: 0.9, maxSeverity: 0.1, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
      ],
    })).toThrow(PolicyConfigError);
  });

  it('should reject unknown actions', () => {
    expect(() => compilePolicySet({
      version: 'bad',
      rules: [
        { id: 'A', minSeverity: 0, maxSeverity: 1, allowedActions: ['nuke'], resourceCost: 1, legalConstraintTag: 'standard' },
      ],
    })).toThrow(PolicyConfigError);
  });

  it('should break overlaps by lowest rule id in natural order', () => {
    const policy = compilePolicySet({
      version: 'overlap',
      rules: [
        { id: 'R10', minSeverity: 0, maxSeverity: 1, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
        { id: 'R2', minSeverity: 0.5, maxSeverity: 1, allowedActions: ['isolate'], resourceCost: 1, legalConstraintTag: 'standard' },
      ],
    });

    expect(selectRule(policy, 0.7).id).toBe('R2');
    expect(selectRule(policy, 0.2).id).toBe('R10');
  });

  it('should match exactly one rule for every score', () => {
    const policy = compilePolicySet(DEFAULT_POLICY);
    for (let i = 0; i <= 100; i++) {
      const rule = selectRule(policy, i / 100);
      expect(rule.minSeverity <= i / 100 && i / 100 <= rule.maxSeverity).toBe(true);
    }
    // Shared boundaries go to the lower id
    expect(selectRule(policy, 0.3).id).toBe('R1');
    expect(selectRule(policy, 0.6).id).toBe('R2');
  });
});

describe('Policy engine selection', () => {
  it('should choose isolate when the budget covers only isolate', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(4));

    const decision = engine.evaluate(incident(), score(0.95), [member('s1', 'host-a')]);

    expect(decision.rule.id).toBe('R1');
    expect(decision.action.kind).toBe('isolate');
    expect(decision.cost).toBe(3);
    expect(decision.action.justification).toEqual({
      scoreId: 'score-1-0.95',
      ruleId: 'R1',
      policyVersion: 'test-1',
      reason: 'rule-match',
    });
  });

  it('should prefer the less restrictive action on a cost tie', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100), {
      actionCostWeights: { noaction: 0, alert: 0, deceive: 1, isolate: 1, block: 1 },
    });
    expect(engine.evaluate(incident(), score(0.95)).action.kind).toBe('isolate');
  });

  it('should fall back to alert when nothing automated is affordable', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(2));
    const decision = engine.evaluate(incident(), score(0.95));

    expect(decision.action.kind).toBe('alert');
    expect(decision.cost).toBe(0);
    expect(decision.action.justification.reason).toBe('budget-exhausted');
  });

  it('should alert instead of acting while dispatch is throttled', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));
    engine.setThrottled(true);

    const decision = engine.evaluate(incident(), score(0.95));
    expect(decision.action.kind).toBe('alert');
    expect(decision.action.justification.reason).toBe('dispatch-throttled');
  });

  it('should never stay silent above the alert threshold', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100), { alertThreshold: 0.5 });

    expect(engine.evaluate(incident(), score(0.2)).action.kind).toBe('noaction');
    const high = engine.evaluate(incident(), score(0.7));
    expect(high.action.kind).toBe('alert');
    expect(high.action.justification.reason).toBe('alert-floor');
  });

  it('should downgrade actions the jurisdiction forbids', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100), {
      enabledLegalTags: ['standard'],
    });

    // R4 allows isolate and block; block needs network-block, isolate needs nothing extra
    expect(engine.legalActions(engine.selectRule(0.9))).toEqual(['isolate']);
    // R3 allows alert, deceive, isolate; deceive falls back to alert
    expect(engine.legalActions(engine.selectRule(0.7))).toEqual(['alert', 'isolate']);
  });

  it('should apply a jurisdiction change at run time', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100));
    expect(engine.legalActions(engine.selectRule(0.9))).toEqual(['isolate', 'block']);

    engine.setJurisdiction(['standard', 'standard']);

    expect(engine.jurisdiction()).toEqual(['standard']);
    expect(engine.legalActions(engine.selectRule(0.9))).toEqual(['isolate']);
    expect(engine.evaluate(incident(), score(0.7)).action.kind).toBe('isolate');
  });

  it('should never escalate when the rule tag itself is disabled', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100), {
      enabledLegalTags: [],
    });

    const decision = engine.evaluate(incident(), score(0.9));
    expect(decision.action.kind).toBe('alert');
    expect(decision.cost).toBe(0);
  });

  it('should be deterministic for the same inputs', () => {
    const make = () => new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(7));
    const members = [member('s1', 'host-a'), member('s2', 'host-b')];
    const pairs = [0, 0.25, 0.45, 0.65, 0.8, 0.9, 1].map(v => ({
      a: make().evaluate(incident(), score(v), members, 5),
      b: make().evaluate(incident(), score(v), members, 5),
    }));

    for (const { a, b } of pairs) {
      expect(a.action).toEqual(b.action);
      expect(a.cost).toBe(b.cost);
    }
  });

  it('should target the busiest source entity', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));
    const decision = engine.evaluate(incident(), score(0.95), [
      member('s1', 'host-b'),
      member('s2', 'host-a'),
      member('s3', 'host-b'),
    ]);

    expect(decision.action).toMatchObject({ kind: 'isolate', targetEntity: 'host-b', durationMs: 900_000 });
  });

  it('should pick a deception profile from the dominant signal kind', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100), {
      deceptionProfiles: { ssh_bruteforce: 'ssh-honeypot' },
    });
    const decision = engine.evaluate(incident(), score(0.7), [
      member('s1', 'host-a', 'ssh_bruteforce'),
      member('s2', 'host-a', 'ssh_bruteforce'),
      member('s3', 'host-a', 'port_scan'),
    ]);

    expect(decision.action).toMatchObject({ kind: 'deceive', targetEntity: 'host-a', profileId: 'ssh-honeypot' });
    expect(decision.cost).toBe(2);
  });

  it('should refuse closed incidents', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100));
    expect(() => engine.evaluate(incident(1, IncidentState.CLOSED), score(0.9))).toThrow(ClosedIncidentError);
  });
});

describe('Policy engine autonomy and defense level', () => {
  it('should withhold automated actions when autonomous response is off', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100), { autonomousResponse: false });

    const decision = engine.evaluate(incident(), score(0.95));

    expect(engine.isAutonomous).toBe(false);
    expect(decision.action.kind).toBe('alert');
    expect(decision.cost).toBe(0);
    expect(decision.withheld).toBe('isolate');
    expect(decision.action.justification.reason).toBe('autonomy-disabled');
    expect(decision.action).toMatchObject({
      summary: 'Incident 1 severity 0.95 under R1 (autonomy-disabled), recommends isolate',
    });
  });

  it('should withhold automated actions at the passive level', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));
    engine.setDefenseLevel('passive');

    const decision = engine.evaluate(incident(), score(0.95));

    expect(decision.action.kind).toBe('alert');
    expect(decision.withheld).toBe('isolate');
    expect(decision.action.justification.reason).toBe('defense-passive');
  });

  it('should select rules on boosted severity at the paranoid level', () => {
    const engine = new PolicyEngine(compilePolicySet(DEFAULT_POLICY), new ResourceBudget(100));
    expect(engine.evaluate(incident(), score(0.8)).action.kind).toBe('deceive');

    engine.setDefenseLevel('paranoid');
    const decision = engine.evaluate(incident(), score(0.8));

    expect(decision.rule.id).toBe('R4');
    expect(decision.action.kind).toBe('isolate');
    expect(decision.cost).toBe(5);
    expect(engine.effectiveSeverity(0.95)).toBe(1);
  });
});

describe('Policy engine commitment', () => {
  it('should consume budget on commit and never go negative', () => {
    const budget = new ResourceBudget(4);
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), budget);

    const first = engine.evaluate(incident(1), score(0.95, 1));
    const second = engine.evaluate(incident(2), score(0.95, 2));

    expect(engine.commit(first).action.kind).toBe('isolate');
    expect(budget.available).toBe(1);

    // Decided while budget was 4, committed after it dropped to 1
    const downgraded = engine.commit(second);
    expect(downgraded.action.kind).toBe('alert');
    expect(downgraded.action.id).toBe(second.action.id);
    expect(downgraded.action.justification.reason).toBe('budget-exhausted');
    expect(budget.available).toBe(1);
  });

  it('should only allow alert or noaction once exhausted until replenished', () => {
    const budget = new ResourceBudget(3);
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), budget);

    engine.commit(engine.evaluate(incident(1), score(0.95, 1)));
    expect(budget.available).toBe(0);
    expect(engine.evaluate(incident(2), score(0.95, 2)).action.kind).toBe('alert');

    budget.replenish();
    expect(budget.available).toBe(3);
    expect(engine.evaluate(incident(2), score(0.95, 2)).action.kind).toBe('isolate');
  });

  it('should not re-dispatch an action already applied', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));

    const first = engine.commit(engine.evaluate(incident(), score(0.95)));
    const again = engine.evaluate(incident(1, IncidentState.ACTIONED), score(0.96));

    expect(first.action.kind).toBe('isolate');
    expect(again.action.kind).toBe('noaction');
    expect(again.action.justification.reason).toBe('already-actioned');
  });

  it('should allow a retry decision after a failed action', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));

    const first = engine.commit(engine.evaluate(incident(), score(0.95)));
    engine.recordOutcome(1, first.action.id, 'failed');

    expect(engine.evaluate(incident(), score(0.95)).action.kind).toBe('isolate');
  });

  it('should refund a refused action and reissue it as an alert', () => {
    const budget = new ResourceBudget(4);
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), budget);
    const first = engine.commit(engine.evaluate(incident(), score(0.95)));
    expect(budget.available).toBe(1);

    expect(engine.refund(1, first.action.id)).toBe(3);
    expect(budget.available).toBe(4);
    expect(engine.strongestApplied(1)).toBeUndefined();
    expect(engine.refund(1, first.action.id)).toBe(0);

    const fallback = engine.reissueAsAlert(1, first.action.id, 'dispatch-throttled');
    expect(fallback?.action.kind).toBe('alert');
    expect(fallback?.action.id).toBe('act-1-2');
    expect(fallback?.action.justification.reason).toBe('dispatch-throttled');
    expect(fallback?.cost).toBe(0);
    expect(engine.decisions(1)).toHaveLength(2);
    expect(engine.strongestApplied(1)).toBe('alert');
    expect(engine.reissueAsAlert(1, 'act-9-9', 'dispatch-throttled')).toBeNull();
  });

  it('should carry decisions across a merge', () => {
    const engine = new PolicyEngine(compilePolicySet(EXAMPLE), new ResourceBudget(100));
    engine.commit(engine.evaluate(incident(2), score(0.95, 2)));

    engine.merge(1, 2);

    expect(engine.decisions(1)).toHaveLength(1);
    expect(engine.decisions(2)).toHaveLength(0);
    expect(engine.strongestApplied(1)).toBe('isolate');
  });
});

describe('Incident lifecycle', () => {
  it('should only allow forward transitions and re-evaluation', () => {
    expect(canTransition(IncidentState.OPEN, IncidentState.EVALUATED)).toBe(true);
    expect(canTransition(IncidentState.OPEN, IncidentState.ACTIONED)).toBe(false);
    expect(canTransition(IncidentState.EVALUATED, IncidentState.ACTIONED)).toBe(true);
    expect(canTransition(IncidentState.ACTIONED, IncidentState.EVALUATED)).toBe(true);
    expect(canTransition(IncidentState.CLOSED, IncidentState.OPEN)).toBe(false);
  });
});

describe('Resource budget', () => {
  it('should cap replenishment at capacity', () => {
    const budget = new ResourceBudget(10, 4);
    expect(budget.tryConsume(8)).toBe(true);
    expect(budget.replenish()).toBe(6);
    expect(budget.replenish()).toBe(10);
    expect(budget.replenish()).toBe(10);
  });

  it('should refuse partial consumption', () => {
    const budget = new ResourceBudget(5);
    expect(budget.tryConsume(6)).toBe(false);
    expect(budget.available).toBe(5);
    expect(budget.tryConsume(5)).toBe(true);
    expect(budget.exhausted).toBe(true);
    expect(budget.tryConsume(1)).toBe(false);
    expect(budget.available).toBe(0);
  });

  it('should replenish on its timer', () => {
    jest.useFakeTimers();
    try {
      const budget = new ResourceBudget(10, 5, 1_000);
      budget.tryConsume(10);
      budget.start();
      jest.advanceTimersByTime(1_000);
      expect(budget.available).toBe(5);
      budget.stop();
      jest.advanceTimersByTime(5_000);
      expect(budget.available).toBe(5);
    } finally {
      jest.useRealTimers();
    }
  });
});
