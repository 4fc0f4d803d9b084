import type { RiskCondition } from './risk-classifier';
import { RISK_CONDITIONS } from './risk-classifier';
import type { CaseStore } from './store';
import type { CaseRecord, ReportRecord, RiskTier } from './types';

export interface RiskSummary {
  tier: RiskTier;
  factors: string[];
  recommendations: string[];
  latestReport: ReportRecord | null;
}

export const FIRST_CHECKIN_RECOMMENDATION = 'Please complete your first monthly check-in';

/**
 * Factor and recommendation per condition, in display order. Stressed mental
 * state raises the tier but has no dedicated guidance.
 */
export const SUMMARY_GUIDANCE: readonly {
  condition: RiskCondition;
  factor: string;
  recommendation: string;
}[] = [
  {
    condition: 'mental_bad',
    factor: 'Poor mental state',
    recommendation: 'Refer to psychological support via the counselling hotline',
  },
  {
    condition: 'homeless',
    factor: 'Homeless',
    recommendation: 'Coordinate with the charitable housing association',
  },
  {
    condition: 'unemployed',
    factor: 'Unemployed',
    recommendation: 'Offer the job opportunities available in the area',
  },
  {
    condition: 'family_problematic',
    factor: 'Family problems',
    recommendation: 'Schedule a family counselling session',
  },
  {
    condition: 'family_no_contact',
    factor: 'No contact with family',
    recommendation: 'Work on rebuilding family ties',
  },
];

export function describeReport(
  tier: RiskTier,
  report: ReportRecord | null,
): RiskSummary {
  if (!report) {
    return {
      tier: 'green',
      factors: [],
      recommendations: [FIRST_CHECKIN_RECOMMENDATION],
      latestReport: null,
    };
  }

  const matching = SUMMARY_GUIDANCE.filter((g) => RISK_CONDITIONS[g.condition](report));
  return {
    tier,
    factors: matching.map((g) => g.factor),
    recommendations: matching.map((g) => g.recommendation),
    latestReport: report,
  };
}

/** Read-only view over the case's most recently submitted check-in. */
export async function summarizeRisk(
  store: CaseStore,
  caseRecord: CaseRecord,
): Promise<RiskSummary> {
  const latest = await store.latestReport(caseRecord.id);
  return describeReport(caseRecord.riskTier, latest);
}
