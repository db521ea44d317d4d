/**
 * Public API of the anchor customer rate engine.
 *
 * Parameter set in; three per-year scenario tables and comparative metrics
 * out. Pure computation, no I/O.
 */

export type {
  CommunityBaseline,
  ComparativeMetrics,
  CoverageStatus,
  CumulativeCoveragePoint,
  DebtAllocation,
  EconomicImpact,
  HouseholdBillRow,
  ParameterSet,
  Scenario,
  ScenarioEffects,
  ScenarioTable,
  ScenarioTables,
  SensitivityPoint,
  YearRecord,
} from './types';
export type { ParamConfig } from './constants';
export type { SensitivityOptions } from './hooks/useSensitivity';

export {
  CO2_TONNES_PER_MWH,
  DEFAULT_COMMUNITY_BASELINE,
  DEFAULT_PARAMETERS,
  DIESEL_MWH_PER_BARREL,
  END_YEAR,
  HOURS_PER_YEAR,
  MIN_RETAIL_RATE,
  PARAM_CONFIGS,
  SCENARIOS,
  START_YEAR,
  YEARS,
} from './constants';
export { DegenerateDivisionError, InvalidParameterError } from './errors';
export { fingerprintParameters } from './fingerprint';
export { validateCommunityBaseline, validateParameters } from './validation';
export {
  annualDebtService,
  anchorLoad,
  communityLoad,
  debtServiceFor,
  dieselUnitCost,
  effectiveHydroCap,
  projectYear,
  recordFor,
  runScenarios,
  scenarioEffects,
  ScenarioCache,
  useScenarios,
} from './hooks/useScenarios';
export {
  anchorAnnualMargin,
  anchorAnnualMwh,
  barrelsAvoided,
  classifyCoverage,
  co2Avoided,
  computeComparativeMetrics,
  coverageRatio,
  cumulativeCoverageSeries,
  cumulativeHouseholdSavings,
  debtAllocation,
  dieselAvoided,
  dieselCostAvoided,
  dieselShare,
  householdBill,
  householdBillComparison,
  isAnchorTariffViable,
  localEconomicImpact,
  rateChangeVsReference,
  useComparativeMetrics,
} from './hooks/useMetrics';
export { MAX_SWEEP_POINTS, sensitivitySweep, useSensitivity } from './hooks/useSensitivity';
