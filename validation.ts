import { z } from 'zod';
import { InvalidParameterError } from './errors';
import type { CommunityBaseline, ParameterSet } from './types';

const growthRate = z.number().finite().gt(-1, 'growth rate must be greater than -1');
const positive = z.number().finite().gt(0, 'must be greater than 0');
const nonNegative = z.number().finite().gte(0, 'must not be negative');
const fraction = z.number().finite().gt(0, 'must be greater than 0').lte(1, 'must not exceed 1');
const year = z.number().int('must be a whole year');

const ParameterSetSchema = z.object({
  // Load
  baseLoadMwh: positive,
  phase1GrowthRate: growthRate,
  phase1EndYear: year,
  phase2GrowthRate: growthRate,
  // Supply
  hydroCapMwh: positive,
  hydroUnitCost: positive,
  expansionYear: year,
  expansionAddedMwh: nonNegative,
  // Diesel
  dieselFloorMwh: nonNegative,
  dieselBaseUnitCost: positive,
  dieselEscalationRate: z.number().finite().gte(-1, 'escalation must be at least -1'),
  // Fixed
  fixedCostPerYear: nonNegative,
  // Financing
  capex: positive,
  utilityDebtShare: fraction,
  financingRate: z.number().finite().gt(0, 'financing rate must be greater than 0'),
  bondTermYears: z.number().int('bond term must be a whole number of years').gt(0, 'bond term must be positive'),
  // Anchor
  anchorPowerMw: nonNegative,
  anchorCapacityFactor: fraction,
  anchorTariffPerMwh: nonNegative,
  // Reference
  referenceRatePerKwh: positive,
});

const CommunityBaselineSchema = z.object({
  households: z.number().int('households must be a whole number').gt(0, 'must be greater than 0'),
  householdAnnualKwh: positive,
  localSpendingMultiplier: z.number().finite().gte(1, 'multiplier must be at least 1'),
  jobsPerMw: nonNegative,
});

function fieldValue(input: unknown, field: string): unknown {
  if (typeof input !== 'object' || input === null) return input;
  return Reflect.get(input, field);
}

function toInvalidParameter(input: unknown, error: z.ZodError, subject: string): InvalidParameterError {
  console.error(`❌ Invalid ${subject}:`, error.flatten().fieldErrors);
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : subject;
  const value = issue && issue.path.length > 0 ? fieldValue(input, String(issue.path[0])) : input;
  return new InvalidParameterError(field, value, issue ? issue.message : 'invalid input');
}

/**
 * Validate a full parameter set before any year is projected.
 * Throws InvalidParameterError naming the first offending field; never clamps.
 */
export function validateParameters(input: unknown): ParameterSet {
  const parsed = ParameterSetSchema.safeParse(input);
  if (!parsed.success) {
    throw toInvalidParameter(input, parsed.error, 'parameter set');
  }
  return parsed.data;
}

export function validateCommunityBaseline(input: unknown): CommunityBaseline {
  const parsed = CommunityBaselineSchema.safeParse(input);
  if (!parsed.success) {
    throw toInvalidParameter(input, parsed.error, 'community baseline');
  }
  return parsed.data;
}
