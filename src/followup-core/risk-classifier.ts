import type { ReportStatus, RiskTier } from './types';

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export const RISK_CONDITION_NAMES = [
  'mental_bad',
  'homeless',
  'unemployed',
  'family_problematic',
  'mental_stressed',
  'family_no_contact',
] as const;

export type RiskCondition = (typeof RISK_CONDITION_NAMES)[number];

type Predicate = (report: ReportStatus) => boolean;

export const RISK_CONDITIONS: Record<RiskCondition, Predicate> = {
  mental_bad: (r) => r.mentalState === 'bad',
  homeless: (r) => r.housingStatus === 'homeless',
  unemployed: (r) => r.jobStatus === 'unemployed',
  family_problematic: (r) => r.familyStatus === 'problematic',
  mental_stressed: (r) => r.mentalState === 'stressed',
  family_no_contact: (r) => r.familyStatus === 'no_contact',
};

// ---------------------------------------------------------------------------
// Tier rules (evaluated in order, first match wins)
// ---------------------------------------------------------------------------

export const TIER_RULES: readonly { tier: Exclude<RiskTier, 'green'>; when: readonly RiskCondition[] }[] = [
  { tier: 'red', when: ['mental_bad', 'homeless'] },
  {
    tier: 'yellow',
    when: ['unemployed', 'family_problematic', 'mental_stressed', 'family_no_contact'],
  },
];

export function matchedConditions(report: ReportStatus): RiskCondition[] {
  return RISK_CONDITION_NAMES.filter((c) => RISK_CONDITIONS[c](report));
}

/**
 * Maps one check-in to a risk tier. Red dominates yellow; tiers are never
 * combined and no history is taken into account.
 */
export function classify(report: ReportStatus): RiskTier {
  for (const rule of TIER_RULES) {
    if (rule.when.some((c) => RISK_CONDITIONS[c](report))) {
      return rule.tier;
    }
  }
  return 'green';
}
