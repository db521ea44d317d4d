import { useMemo } from 'react';
import {
  HOURS_PER_YEAR,
  KWH_PER_MWH,
  MIN_RETAIL_RATE,
  START_YEAR,
  YEARS,
} from '../constants';
import { DegenerateDivisionError, InvalidParameterError } from '../errors';
import { fingerprintParameters } from '../fingerprint';
import { validateParameters } from '../validation';
import type {
  ParameterSet,
  Scenario,
  ScenarioEffects,
  ScenarioTable,
  ScenarioTables,
  YearRecord,
} from '../types';

// ---------------------------------------------------------------------------
// Annuity: fixed annual payment on the utility's share of the expansion capex.
//
//   principal = capex × share
//   payment   = principal × r × (1 + r)^n / ((1 + r)^n − 1)
//             = principal × r / (1 − (1 + r)^−n)
//
// The second form is evaluated through expm1/log1p so long terms and tiny
// rates stay finite. r = 0 makes the denominator zero; zero-rate financing is
// not supported.
// ---------------------------------------------------------------------------
export function annualDebtService(
  capex: number,
  share: number,
  rate: number,
  termYears: number,
): number {
  if (rate === 0) {
    throw new DegenerateDivisionError('financingRate', 'annuity denominator (1 + r)^n − 1 with r = 0');
  }
  if (!Number.isFinite(rate) || rate < 0) {
    throw new InvalidParameterError('financingRate', rate, 'must be greater than 0');
  }
  if (!Number.isInteger(termYears) || termYears <= 0) {
    throw new InvalidParameterError('bondTermYears', termYears, 'must be a positive whole number of years');
  }
  const principal = capex * share;
  if (!Number.isFinite(principal) || principal <= 0) {
    throw new InvalidParameterError('capex', capex, `financed principal ${principal} must be greater than 0`);
  }

  const denominator = -Math.expm1(-termYears * Math.log1p(rate));
  const payment = (principal * rate) / denominator;
  if (!(denominator > 0) || !Number.isFinite(payment)) {
    throw new DegenerateDivisionError(
      'financingRate',
      `annuity denominator 1 − (1 + r)^−n = ${denominator} for r = ${rate}, n = ${termYears}`,
    );
  }
  return payment;
}

export function debtServiceFor(params: ParameterSet): number {
  return annualDebtService(params.capex, params.utilityDebtShare, params.financingRate, params.bondTermYears);
}

export function scenarioEffects(scenario: Scenario): ScenarioEffects {
  switch (scenario) {
    case 'StatusQuo':
      return { expansion: false, anchor: false };
    case 'ExpansionOnly':
      return { expansion: true, anchor: false };
    case 'ExpansionPlusAnchor':
      return { expansion: true, anchor: true };
  }
}

// ---------------------------------------------------------------------------
// Two-phase compound load growth. Phase 2 compounds from the phase-1 value at
// phase1EndYear, so the two segments meet at the boundary.
// ---------------------------------------------------------------------------
export function communityLoad(params: ParameterSet, year: number): number {
  const { baseLoadMwh, phase1GrowthRate, phase1EndYear, phase2GrowthRate } = params;
  if (year <= phase1EndYear) {
    return baseLoadMwh * Math.pow(1 + phase1GrowthRate, year - START_YEAR);
  }
  const terminal = baseLoadMwh * Math.pow(1 + phase1GrowthRate, phase1EndYear - START_YEAR);
  return terminal * Math.pow(1 + phase2GrowthRate, year - phase1EndYear);
}

export function effectiveHydroCap(params: ParameterSet, scenario: Scenario, year: number): number {
  const { expansion } = scenarioEffects(scenario);
  if (expansion && year >= params.expansionYear) {
    return params.hydroCapMwh + params.expansionAddedMwh;
  }
  return params.hydroCapMwh;
}

export function anchorLoad(params: ParameterSet, scenario: Scenario, year: number): number {
  const { anchor } = scenarioEffects(scenario);
  if (anchor && year >= params.expansionYear) {
    return params.anchorPowerMw * params.anchorCapacityFactor * HOURS_PER_YEAR;
  }
  return 0;
}

export function dieselUnitCost(params: ParameterSet, year: number): number {
  return params.dieselBaseUnitCost * Math.pow(1 + params.dieselEscalationRate, year - START_YEAR);
}

/**
 * One year of one scenario. Pure: the same (params, scenario, year, debtService)
 * always yields the same record.
 *
 * Hydro is dispatched first and diesel covers the residual, but never less than
 * the floor. When the floor exceeds the real shortfall, hydro is still the
 * complement of diesel and absorbs the difference.
 */
export function projectYear(
  params: ParameterSet,
  scenario: Scenario,
  year: number,
  debtService: number,
): YearRecord {
  const { expansion } = scenarioEffects(scenario);

  const communityLoadMwh = communityLoad(params, year);
  if (communityLoadMwh === 0 || !Number.isFinite(communityLoadMwh)) {
    throw new DegenerateDivisionError('communityLoadMwh', `retail rate for ${scenario} in ${year}`);
  }
  const effectiveHydroCapMwh = effectiveHydroCap(params, scenario, year);
  const anchorLoadMwh = anchorLoad(params, scenario, year);
  const totalDemandMwh = communityLoadMwh + anchorLoadMwh;

  const dieselMwh = Math.max(params.dieselFloorMwh, totalDemandMwh - effectiveHydroCapMwh);
  if (dieselMwh > totalDemandMwh) {
    throw new InvalidParameterError(
      'dieselFloorMwh',
      params.dieselFloorMwh,
      `exceeds total demand of ${totalDemandMwh} MWh in ${year}`,
    );
  }
  const hydroMwh = totalDemandMwh - dieselMwh;

  const unitCost = dieselUnitCost(params, year);
  const hydroCost = params.hydroUnitCost * hydroMwh;
  const dieselCost = unitCost * dieselMwh;
  const yearDebtService = expansion && year >= params.expansionYear ? debtService : 0;
  const anchorRevenue = anchorLoadMwh * params.anchorTariffPerMwh;

  const totalCost = params.fixedCostPerYear + hydroCost + dieselCost + yearDebtService;
  const communityCost = totalCost - anchorRevenue;

  const retailRatePerKwh = Math.max(MIN_RETAIL_RATE, communityCost / (communityLoadMwh * KWH_PER_MWH));

  return Object.freeze({
    year,
    communityLoadMwh,
    anchorLoadMwh,
    totalDemandMwh,
    effectiveHydroCapMwh,
    hydroMwh,
    dieselMwh,
    dieselUnitCost: unitCost,
    hydroCost,
    dieselCost,
    debtService: yearDebtService,
    anchorRevenue,
    totalCost,
    communityCost,
    retailRatePerKwh,
  });
}

function projectTables(params: ParameterSet): ScenarioTables {
  const debtService = debtServiceFor(params);
  const project = (scenario: Scenario): ScenarioTable =>
    Object.freeze(YEARS.map((year) => projectYear(params, scenario, year, debtService)));

  return Object.freeze({
    StatusQuo: project('StatusQuo'),
    ExpansionOnly: project('ExpansionOnly'),
    ExpansionPlusAnchor: project('ExpansionPlusAnchor'),
  });
}

/**
 * Validate the parameter set, then project every year for all three scenarios.
 * Any invalid field fails the whole run; no partial tables are returned.
 */
export function runScenarios(input: ParameterSet): ScenarioTables {
  return projectTables(validateParameters(input));
}

export function recordFor(table: ScenarioTable, year: number): YearRecord {
  const record = table.find((r) => r.year === year);
  if (!record) {
    throw new InvalidParameterError('year', year, 'outside the projection range');
  }
  return record;
}

// ---------------------------------------------------------------------------
// Results depend only on parameter values, so they are cached by fingerprint.
// No expiry: a fingerprint always maps to the same tables.
// ---------------------------------------------------------------------------
export class ScenarioCache {
  private readonly entries = new Map<string, ScenarioTables>();

  run(input: ParameterSet): ScenarioTables {
    const params = validateParameters(input);
    const key = fingerprintParameters(params);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const tables = projectTables(params);
    this.entries.set(key, tables);
    return tables;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

// ---------------------------------------------------------------------------
// useScenarios hook
// ---------------------------------------------------------------------------
export const useScenarios = (params: ParameterSet): ScenarioTables => {
  return useMemo(() => runScenarios(params), [params]);
};
