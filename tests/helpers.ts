import { DEFAULT_PARAMETERS, PARAM_CONFIGS } from '../constants';
import type { ParameterSet } from '../types';

export const DEFAULTS: ParameterSet = { ...DEFAULT_PARAMETERS };

export function approxEq(a: number, b: number, tol = 1e-9) {
  return Math.abs(a - b) < tol * Math.max(1, Math.abs(a), Math.abs(b));
}

// mulberry32: small seeded PRNG so generated parameter sets repeat across runs.
export function seededRandom(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** A valid parameter set drawn from each field's UI range. */
export function randomParameters(random: () => number): ParameterSet {
  const draw = (field: keyof ParameterSet): number => {
    const { min, max, integer } = PARAM_CONFIGS[field];
    const x = min + random() * (max - min);
    return integer ? Math.round(x) : x;
  };
  return {
    baseLoadMwh: draw('baseLoadMwh'),
    phase1GrowthRate: draw('phase1GrowthRate'),
    phase1EndYear: draw('phase1EndYear'),
    phase2GrowthRate: draw('phase2GrowthRate'),
    hydroCapMwh: draw('hydroCapMwh'),
    hydroUnitCost: draw('hydroUnitCost'),
    expansionYear: draw('expansionYear'),
    expansionAddedMwh: draw('expansionAddedMwh'),
    dieselFloorMwh: draw('dieselFloorMwh'),
    dieselBaseUnitCost: draw('dieselBaseUnitCost'),
    dieselEscalationRate: draw('dieselEscalationRate'),
    fixedCostPerYear: draw('fixedCostPerYear'),
    capex: draw('capex'),
    utilityDebtShare: draw('utilityDebtShare'),
    financingRate: draw('financingRate'),
    bondTermYears: draw('bondTermYears'),
    anchorPowerMw: draw('anchorPowerMw'),
    anchorCapacityFactor: draw('anchorCapacityFactor'),
    anchorTariffPerMwh: draw('anchorTariffPerMwh'),
    referenceRatePerKwh: draw('referenceRatePerKwh'),
  };
}
