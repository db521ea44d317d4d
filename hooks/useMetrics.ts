import { useMemo } from 'react';
import {
  CO2_TONNES_PER_MWH,
  CONSTRUCTION_JOBS_PER_MW,
  CONSTRUCTION_PAYROLL_PER_JOB,
  DEFAULT_COMMUNITY_BASELINE,
  DIESEL_MWH_PER_BARREL,
  END_YEAR,
  HOURS_PER_YEAR,
  OPERATING_PAYROLL_PER_JOB,
  SCENARIOS,
  START_YEAR,
  YEARS,
} from '../constants';
import { DegenerateDivisionError, InvalidParameterError } from '../errors';
import { validateCommunityBaseline, validateParameters } from '../validation';
import { debtServiceFor, recordFor } from './useScenarios';
import type {
  CommunityBaseline,
  ComparativeMetrics,
  CoverageStatus,
  CumulativeCoveragePoint,
  DebtAllocation,
  EconomicImpact,
  HouseholdBillRow,
  ParameterSet,
  Scenario,
  ScenarioTable,
  ScenarioTables,
  YearRecord,
} from '../types';

// ---------------------------------------------------------------------------
// Pairwise reducers. Tables are compared year by year; both must cover the
// same years in the same order.
// ---------------------------------------------------------------------------
function sumDifference(
  x: ScenarioTable,
  y: ScenarioTable,
  value: (record: YearRecord) => number,
): number {
  if (x.length !== y.length) {
    throw new InvalidParameterError('tables', `${x.length} vs ${y.length}`, 'scenario tables cover different year ranges');
  }
  let total = 0;
  x.forEach((record, i) => {
    const other = y[i];
    if (other.year !== record.year) {
      throw new InvalidParameterError('year', other.year, `expected ${record.year} at position ${i}`);
    }
    total += value(record) - value(other);
  });
  return total;
}

/** Diesel MWh that scenario x burns beyond scenario y over the full range. */
export function dieselAvoided(x: ScenarioTable, y: ScenarioTable): number {
  return sumDifference(x, y, (r) => r.dieselMwh);
}

export function dieselCostAvoided(x: ScenarioTable, y: ScenarioTable): number {
  return sumDifference(x, y, (r) => r.dieselCost);
}

export function co2Avoided(dieselMwh: number): number {
  return dieselMwh * CO2_TONNES_PER_MWH;
}

export function barrelsAvoided(dieselMwh: number): number {
  return dieselMwh / DIESEL_MWH_PER_BARREL;
}

export function anchorAnnualMwh(params: ParameterSet): number {
  return params.anchorPowerMw * params.anchorCapacityFactor * HOURS_PER_YEAR;
}

/**
 * Anchor revenue above what the same energy would cost at the hydro wholesale
 * rate. Load and tariff are constant while the anchor is active, so one value
 * covers every year.
 */
export function anchorAnnualMargin(params: ParameterSet): number {
  return anchorAnnualMwh(params) * (params.anchorTariffPerMwh - params.hydroUnitCost);
}

export function coverageRatio(margin: number, debtService: number): number {
  if (debtService <= 0) return 0;
  return margin / debtService;
}

/**
 * Household bill savings of x relative to y, summed over fromYear..toYear
 * inclusive: Σ (rate[x] − rate[y]) × householdKwh. An empty range sums to 0.
 */
export function cumulativeHouseholdSavings(
  x: ScenarioTable,
  y: ScenarioTable,
  householdKwh: number,
  fromYear: number,
  toYear: number,
): number {
  let total = 0;
  for (let year = fromYear; year <= toYear; year++) {
    total += (recordFor(x, year).retailRatePerKwh - recordFor(y, year).retailRatePerKwh) * householdKwh;
  }
  return total;
}

export function isAnchorTariffViable(params: ParameterSet): boolean {
  return params.anchorTariffPerMwh >= params.hydroUnitCost;
}

/**
 * Status Quo against Expansion + Anchor. Household savings run from the
 * expansion year (or the first projected year) through the last one.
 */
export function computeComparativeMetrics(
  tables: ScenarioTables,
  parameters: ParameterSet,
  community: CommunityBaseline = DEFAULT_COMMUNITY_BASELINE,
): ComparativeMetrics {
  const params = validateParameters(parameters);
  const baseline = validateCommunityBaseline(community);

  if (!isAnchorTariffViable(params)) {
    console.warn(
      `⚠️ Anchor tariff ${params.anchorTariffPerMwh}/MWh is below the hydro wholesale rate ${params.hydroUnitCost}/MWh`,
    );
  }

  const statusQuo = tables.StatusQuo;
  const withAnchor = tables.ExpansionPlusAnchor;

  const debtService = debtServiceFor(params);
  const online = tables.ExpansionOnly.find((r) => r.year === params.expansionYear);
  if (online && online.debtService !== debtService) {
    throw new InvalidParameterError(
      'tables',
      online.debtService,
      `debt service in ${params.expansionYear} does not match ${debtService} from these parameters`,
    );
  }

  const dieselAvoidedMwh = dieselAvoided(statusQuo, withAnchor);
  const anchorAnnualMarginValue = anchorAnnualMargin(params);
  const cumulative = cumulativeHouseholdSavings(
    statusQuo,
    withAnchor,
    baseline.householdAnnualKwh,
    Math.max(params.expansionYear, START_YEAR),
    END_YEAR,
  );

  return {
    dieselAvoidedMwh,
    dieselCostAvoided: dieselCostAvoided(statusQuo, withAnchor),
    co2AvoidedTonnes: co2Avoided(dieselAvoidedMwh),
    barrelsAvoided: barrelsAvoided(dieselAvoidedMwh),
    anchorAnnualMwh: anchorAnnualMwh(params),
    anchorAnnualMargin: anchorAnnualMarginValue,
    debtService,
    coverageRatio: coverageRatio(anchorAnnualMarginValue, debtService),
    cumulativeHouseholdSavings: cumulative,
    communityCumulativeSavings: cumulative * baseline.households,
  };
}

export const useComparativeMetrics = (
  tables: ScenarioTables,
  params: ParameterSet,
  baseline: CommunityBaseline = DEFAULT_COMMUNITY_BASELINE,
): ComparativeMetrics => {
  return useMemo(
    () => computeComparativeMetrics(tables, params, baseline),
    [tables, params, baseline],
  );
};

// ---------------------------------------------------------------------------
// Community outlook
// ---------------------------------------------------------------------------

/** Fractional change of a rate against today's reference rate. */
export function rateChangeVsReference(rate: number, referenceRate: number): number {
  if (referenceRate === 0) {
    throw new DegenerateDivisionError('referenceRatePerKwh', 'rate change against today');
  }
  return (rate - referenceRate) / referenceRate;
}

export function householdBill(table: ScenarioTable, year: number, householdKwh: number): number {
  return recordFor(table, year).retailRatePerKwh * householdKwh;
}

export function householdBillComparison(
  tables: ScenarioTables,
  years: readonly number[],
  householdKwh: number,
): HouseholdBillRow[] {
  return years.map((year) => {
    const bills: Record<Scenario, number> = { StatusQuo: 0, ExpansionOnly: 0, ExpansionPlusAnchor: 0 };
    for (const scenario of SCENARIOS) {
      bills[scenario] = householdBill(tables[scenario], year, householdKwh);
    }
    return { year, bills };
  });
}

export function dieselShare(record: YearRecord): number {
  if (record.totalDemandMwh === 0) {
    throw new DegenerateDivisionError('totalDemandMwh', `diesel share in ${record.year}`);
  }
  return record.dieselMwh / record.totalDemandMwh;
}

export function classifyCoverage(ratio: number): CoverageStatus {
  if (ratio > 1) return 'surplus';
  if (ratio >= 0.9) return 'covered';
  if (ratio >= 0.5) return 'partial';
  return 'insufficient';
}

/**
 * Split of one year's expansion debt service: what the anchor margin offsets,
 * what ratepayers still carry, and any margin left over for rate reduction.
 */
export function debtAllocation(debtService: number, anchorMargin: number): DebtAllocation {
  const residual = Math.max(0, debtService - anchorMargin);
  const surplus = Math.max(0, anchorMargin - debtService);
  return {
    debtService,
    anchorOffset: surplus === 0 ? anchorMargin : debtService,
    residual,
    surplus,
  };
}

export function cumulativeCoverageSeries(
  params: ParameterSet,
  debtService: number,
  anchorMargin: number,
): CumulativeCoveragePoint[] {
  return YEARS.filter((year) => year >= params.expansionYear).map((year) => {
    const yearsOnline = year - params.expansionYear + 1;
    return {
      year,
      cumulativeDebt: debtService * yearsOnline,
      cumulativeAnchorMargin: anchorMargin * yearsOnline,
    };
  });
}

export function localEconomicImpact(params: ParameterSet, baseline: CommunityBaseline): EconomicImpact {
  const operatingJobs = params.anchorPowerMw * baseline.jobsPerMw;
  const constructionJobs = params.anchorPowerMw * CONSTRUCTION_JOBS_PER_MW;
  const operatingPayroll = operatingJobs * OPERATING_PAYROLL_PER_JOB;
  const constructionPayroll = constructionJobs * CONSTRUCTION_PAYROLL_PER_JOB;
  return {
    operatingJobs,
    constructionJobs,
    operatingPayroll,
    constructionPayroll,
    localEconomicImpact: (operatingPayroll + constructionPayroll) * baseline.localSpendingMultiplier,
  };
}
