/**
 * Policy Rules
 * ============
 *
 * Loading, validation and selection of severity-banded response rules.
 * Rule ranges are inclusive and must cover [0, 1] without gaps; where
 * ranges overlap the lowest rule id wins, compared in natural order so
 * that R2 sorts before R10.
 */

import { z } from 'zod';
import { ActionKind, PolicyRule, PolicySet } from '../types/index.js';
import { PolicyConfigError } from '../errors.js';

export const ActionKindZ = z.enum(['noaction', 'alert', 'deceive', 'isolate', 'block']);

export const PolicyRuleZ = z
  .object({
    id: z.string().min(1),
    minSeverity: z.number().min(0).max(1),
    maxSeverity: z.number().min(0).max(1),
    allowedActions: z.array(ActionKindZ).min(1),
    resourceCost: z.number().nonnegative(),
    legalConstraintTag: z.string().min(1),
    blockScope: z.enum(['host', 'segment', 'network']).optional(),
  })
  .strict()
  .refine(r => r.minSeverity <= r.maxSeverity, {
    message: 'minSeverity must not exceed maxSeverity',
  });

export const PolicySetZ = z
  .object({
    version: z.string().min(1),
    rules: z.array(PolicyRuleZ).min(1),
  })
  .strict();

export type PolicySetInput = z.input<typeof PolicySetZ>;

const AUTOMATED: ReadonlySet<ActionKind> = new Set<ActionKind>(['deceive', 'isolate', 'block']);

export function isAutomated(kind: ActionKind): boolean {
  return AUTOMATED.has(kind);
}

const collator = new Intl.Collator('en', { numeric: true });

export function compareRuleIds(a: string, b: string): number {
  return collator.compare(a, b);
}

/**
 * Validate raw policy input and freeze it into a PolicySet
 */
export function compilePolicySet(input: unknown): PolicySet {
  const parsed = PolicySetZ.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyConfigError(`Invalid policy set: ${detail}`);
  }

  const ids = new Set<string>();
  const rules: PolicyRule[] = [];
  for (const raw of parsed.data.rules) {
    if (ids.has(raw.id)) {
      throw new PolicyConfigError(`Duplicate rule id ${raw.id}`);
    }
    ids.add(raw.id);

    const allowed = new Set<ActionKind>(raw.allowedActions);
    if (raw.resourceCost <= 0 && raw.allowedActions.some(isAutomated)) {
      throw new PolicyConfigError(`Rule ${raw.id} allows automated actions but has no resource cost`);
    }

    rules.push(Object.freeze({
      id: raw.id,
      minSeverity: raw.minSeverity,
      maxSeverity: raw.maxSeverity,
      allowedActions: allowed,
      resourceCost: raw.resourceCost,
      legalConstraintTag: raw.legalConstraintTag,
      blockScope: raw.blockScope,
    }));
  }

  assertCoverage(rules);

  rules.sort((a, b) => compareRuleIds(a.id, b.id));
  return Object.freeze({ version: parsed.data.version, rules: Object.freeze(rules) });
}

/**
 * Every score in [0, 1] must match at least one rule
 */
export function assertCoverage(rules: readonly PolicyRule[]): void {
  const byStart = [...rules].sort((a, b) => a.minSeverity - b.minSeverity);
  let covered = 0;
  let started = false;

  for (const rule of byStart) {
    if (!started) {
      if (rule.minSeverity > 0) {
        throw new PolicyConfigError(`No rule covers severity 0 (first rule starts at ${rule.minSeverity})`);
      }
      started = true;
    } else if (rule.minSeverity > covered) {
      throw new PolicyConfigError(`Severity gap between ${covered} and ${rule.minSeverity}`);
    }
    covered = Math.max(covered, rule.maxSeverity);
  }

  if (covered < 1) {
    throw new PolicyConfigError(`No rule covers severity above ${covered}`);
  }
}

/**
 * Pick the rule for a score: inclusive range, lowest id on ties
 */
export function selectRule(policy: PolicySet, value: number): PolicyRule {
  for (const rule of policy.rules) {
    if (value >= rule.minSeverity && value <= rule.maxSeverity) {
      return rule;
    }
  }
  throw new PolicyConfigError(`No rule matches severity ${value}`);
}

export const DEFAULT_POLICY: PolicySetInput = {
  version: '1.0.0',
  rules: [
    { id: 'R1', minSeverity: 0, maxSeverity: 0.3, allowedActions: ['noaction'], resourceCost: 0, legalConstraintTag: 'standard' },
    { id: 'R2', minSeverity: 0.3, maxSeverity: 0.6, allowedActions: ['alert'], resourceCost: 0, legalConstraintTag: 'standard' },
    { id: 'R3', minSeverity: 0.6, maxSeverity: 0.85, allowedActions: ['alert', 'deceive', 'isolate'], resourceCost: 2, legalConstraintTag: 'standard' },
    { id: 'R4', minSeverity: 0.85, maxSeverity: 1, allowedActions: ['isolate', 'block'], resourceCost: 5, legalConstraintTag: 'standard', blockScope: 'host' },
  ],
};
