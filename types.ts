export interface ParameterSet {
  /** Community energy sales in the start year (MWh). */
  baseLoadMwh: number;
  /** Fractional compound growth per year up to and including phase1EndYear. */
  phase1GrowthRate: number;
  phase1EndYear: number;
  /** Fractional compound growth per year after phase1EndYear. */
  phase2GrowthRate: number;
  /** Annual hydro energy available before any expansion (MWh). */
  hydroCapMwh: number;
  /** Wholesale hydro cost ($/MWh). */
  hydroUnitCost: number;
  /** First year the added hydro capacity (and the anchor, where present) is online. */
  expansionYear: number;
  expansionAddedMwh: number;
  /** Minimum diesel generation that runs every year regardless of hydro headroom (MWh). */
  dieselFloorMwh: number;
  /** All-in diesel cost in the start year ($/MWh). */
  dieselBaseUnitCost: number;
  dieselEscalationRate: number;
  fixedCostPerYear: number;
  /** Total expansion capital cost ($). */
  capex: number;
  /** Fraction of capex the utility finances, in (0, 1]. */
  utilityDebtShare: number;
  financingRate: number;
  bondTermYears: number;
  anchorPowerMw: number;
  anchorCapacityFactor: number;
  anchorTariffPerMwh: number;
  /** Today's observed retail rate ($/kWh). Configured, never derived. */
  referenceRatePerKwh: number;
}

// ---------------------------------------------------------------------------
// Scenario tags. Expansion and anchor effects are derived from the tag with an
// exhaustive switch, so "anchor without expansion" cannot be expressed.
// ---------------------------------------------------------------------------
export type Scenario = 'StatusQuo' | 'ExpansionOnly' | 'ExpansionPlusAnchor';

export interface ScenarioEffects {
  expansion: boolean;
  anchor: boolean;
}

export interface YearRecord {
  year: number;
  communityLoadMwh: number;
  anchorLoadMwh: number;
  totalDemandMwh: number;
  effectiveHydroCapMwh: number;
  hydroMwh: number;
  dieselMwh: number;
  /** Escalated diesel cost for this year ($/MWh). */
  dieselUnitCost: number;
  hydroCost: number;
  dieselCost: number;
  debtService: number;
  anchorRevenue: number;
  totalCost: number;
  /** totalCost less anchor revenue. Can be negative; the retail rate floor masks it. */
  communityCost: number;
  /** Community retail rate ($/kWh), never below MIN_RETAIL_RATE. */
  retailRatePerKwh: number;
}

export type ScenarioTable = readonly YearRecord[];

export type ScenarioTables = Readonly<Record<Scenario, ScenarioTable>>;

export interface CommunityBaseline {
  households: number;
  householdAnnualKwh: number;
  localSpendingMultiplier: number;
  jobsPerMw: number;
}

export interface ComparativeMetrics {
  dieselAvoidedMwh: number;
  dieselCostAvoided: number;
  co2AvoidedTonnes: number;
  barrelsAvoided: number;
  anchorAnnualMwh: number;
  /** Anchor revenue above what the same energy costs at the hydro wholesale rate ($/yr). */
  anchorAnnualMargin: number;
  debtService: number;
  /** anchorAnnualMargin / debtService, 0 when there is no debt service. */
  coverageRatio: number;
  /** Per-household bill savings, ExpansionPlusAnchor vs StatusQuo, expansion year onward ($). */
  cumulativeHouseholdSavings: number;
  communityCumulativeSavings: number;
}

export type CoverageStatus = 'surplus' | 'covered' | 'partial' | 'insufficient';

export interface DebtAllocation {
  debtService: number;
  anchorOffset: number;
  /** Debt service left for ratepayers after the anchor margin. */
  residual: number;
  /** Anchor margin beyond the debt service, available for rate reduction. */
  surplus: number;
}

export interface CumulativeCoveragePoint {
  year: number;
  cumulativeDebt: number;
  cumulativeAnchorMargin: number;
}

export interface HouseholdBillRow {
  year: number;
  bills: Record<Scenario, number>;
}

export interface EconomicImpact {
  operatingJobs: number;
  constructionJobs: number;
  operatingPayroll: number;
  constructionPayroll: number;
  localEconomicImpact: number;
}

export interface SensitivityPoint {
  x: number;
  rates: Record<Scenario, number>;
}
