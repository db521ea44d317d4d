import type { CommunityBaseline, ParameterSet, Scenario } from './types';

export const START_YEAR = 2023;
export const END_YEAR = 2035;
export const HOURS_PER_YEAR = 8760;
export const KWH_PER_MWH = 1000;
/** Retail rate floor ($/kWh). */
export const MIN_RETAIL_RATE = 0.05;
export const CO2_TONNES_PER_MWH = 0.7;
export const DIESEL_MWH_PER_BARREL = 0.01709;

export const SCENARIOS: readonly Scenario[] = ['StatusQuo', 'ExpansionOnly', 'ExpansionPlusAnchor'];

export const YEARS: readonly number[] = Array.from(
  { length: END_YEAR - START_YEAR + 1 },
  (_, i) => START_YEAR + i,
);

// Construction jobs per anchor MW and annual payroll per job, used for the
// local economic impact estimate.
export const CONSTRUCTION_JOBS_PER_MW = 6;
export const OPERATING_PAYROLL_PER_JOB = 75_000;
export const CONSTRUCTION_PAYROLL_PER_JOB = 65_000;

export const DEFAULT_PARAMETERS: Readonly<ParameterSet> = Object.freeze({
  baseLoadMwh: 40_708,
  phase1GrowthRate: 0.05,
  phase1EndYear: 2027,
  phase2GrowthRate: 0.02,
  hydroCapMwh: 40_200,
  hydroUnitCost: 93,
  expansionYear: 2027,
  expansionAddedMwh: 37_000,
  dieselFloorMwh: 200,
  dieselBaseUnitCost: 150,
  dieselEscalationRate: 0.03,
  fixedCostPerYear: 1_200_000,
  capex: 20_000_000,
  utilityDebtShare: 0.4,
  financingRate: 0.05,
  bondTermYears: 25,
  anchorPowerMw: 2.0,
  anchorCapacityFactor: 0.9,
  anchorTariffPerMwh: 120,
  referenceRatePerKwh: 0.1232,
});

export const DEFAULT_COMMUNITY_BASELINE: Readonly<CommunityBaseline> = Object.freeze({
  households: 1_174,
  householdAnnualKwh: 9_000,
  localSpendingMultiplier: 1.7,
  jobsPerMw: 1.5,
});

// ---------------------------------------------------------------------------
// Input ranges offered to a parameter UI. Also the default sweep bounds for
// sensitivity analysis.
// ---------------------------------------------------------------------------
export type ParamConfig = {
  label: string;
  min: number;
  max: number;
  step: number;
  unit: string;
  integer?: boolean;
};

export const PARAM_CONFIGS: Record<keyof ParameterSet, ParamConfig> = {
  baseLoadMwh: { label: 'Baseline load', min: 20_000, max: 80_000, step: 500, unit: 'MWh/yr' },
  phase1GrowthRate: { label: 'Phase 1 load growth', min: 0.01, max: 0.1, step: 0.005, unit: '/yr' },
  phase1EndYear: { label: 'Phase 1 ends', min: 2026, max: 2028, step: 1, unit: 'year', integer: true },
  phase2GrowthRate: { label: 'Steady-state load growth', min: 0.005, max: 0.05, step: 0.005, unit: '/yr' },
  hydroCapMwh: { label: 'Hydro energy cap', min: 20_000, max: 60_000, step: 500, unit: 'MWh/yr' },
  hydroUnitCost: { label: 'Hydro wholesale rate', min: 50, max: 150, step: 1, unit: '$/MWh' },
  expansionYear: { label: 'Expansion online year', min: 2026, max: 2029, step: 1, unit: 'year', integer: true },
  expansionAddedMwh: { label: 'Added hydro energy', min: 10_000, max: 60_000, step: 1_000, unit: 'MWh/yr' },
  dieselFloorMwh: { label: 'Diesel operational floor', min: 0, max: 2_000, step: 50, unit: 'MWh/yr' },
  dieselBaseUnitCost: { label: 'Diesel all-in cost', min: 80, max: 300, step: 5, unit: '$/MWh' },
  dieselEscalationRate: { label: 'Diesel cost escalation', min: 0, max: 0.06, step: 0.005, unit: '/yr' },
  fixedCostPerYear: { label: 'Utility fixed costs', min: 500_000, max: 5_000_000, step: 50_000, unit: '$/yr' },
  capex: { label: 'Expansion capex', min: 10_000_000, max: 50_000_000, step: 500_000, unit: '$' },
  utilityDebtShare: { label: 'Utility share of debt', min: 0.2, max: 0.6, step: 0.05, unit: 'fraction' },
  financingRate: { label: 'Financing rate', min: 0.03, max: 0.08, step: 0.0025, unit: '/yr' },
  bondTermYears: { label: 'Bond term', min: 20, max: 30, step: 5, unit: 'years', integer: true },
  anchorPowerMw: { label: 'Anchor nameplate load', min: 0.5, max: 5, step: 0.1, unit: 'MW' },
  anchorCapacityFactor: { label: 'Anchor capacity factor', min: 0.7, max: 0.99, step: 0.01, unit: 'fraction' },
  anchorTariffPerMwh: { label: 'Anchor tariff', min: 70, max: 200, step: 5, unit: '$/MWh' },
  referenceRatePerKwh: { label: "Today's retail rate", min: 0.05, max: 0.3, step: 0.005, unit: '$/kWh' },
};
