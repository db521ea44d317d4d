import { useMemo } from 'react';
import { PARAM_CONFIGS, SCENARIOS, YEARS } from '../constants';
import { InvalidParameterError } from '../errors';
import { ScenarioCache, recordFor } from './useScenarios';
import type { ParameterSet, Scenario, SensitivityPoint } from '../types';

export interface SensitivityOptions {
  min?: number;
  max?: number;
  step?: number;
  /** Year whose retail rate is reported. Defaults to 2030. */
  targetYear?: number;
}

const DEFAULT_TARGET_YEAR = 2030;

/** Upper bound on projections per sweep; the widest UI range needs 101. */
export const MAX_SWEEP_POINTS = 500;

// ---------------------------------------------------------------------------
// One-parameter sweep: re-run all three scenarios for each value of `field`
// between min and max (inclusive, max always sampled) and report the retail
// rate of the target year. Bounds default to the parameter's UI range.
// ---------------------------------------------------------------------------
export function sensitivitySweep(
  params: ParameterSet,
  field: keyof ParameterSet,
  options: SensitivityOptions = {},
): SensitivityPoint[] {
  const config = PARAM_CONFIGS[field];
  const min = options.min ?? config.min;
  const max = options.max ?? config.max;
  const step = options.step ?? config.step;
  const targetYear = options.targetYear ?? DEFAULT_TARGET_YEAR;

  if (!(step > 0)) {
    throw new InvalidParameterError('step', step, 'sweep step must be greater than 0');
  }
  if (!(min <= max)) {
    throw new InvalidParameterError('min', min, `sweep minimum must not exceed maximum ${max}`);
  }
  if (!YEARS.includes(targetYear)) {
    throw new InvalidParameterError('targetYear', targetYear, 'outside the projection range');
  }

  const count = Math.floor((max - min) / step + 1e-9);
  if (!Number.isFinite(count) || count + 1 > MAX_SWEEP_POINTS) {
    throw new InvalidParameterError(
      'step',
      step,
      `sweep from ${min} to ${max} would take more than ${MAX_SWEEP_POINTS} points`,
    );
  }

  const cache = new ScenarioCache();
  const sample = (x: number): SensitivityPoint => {
    const value = config.integer ? Math.round(x) : x;
    const tables = cache.run({ ...params, [field]: value });
    const rates: Record<Scenario, number> = { StatusQuo: 0, ExpansionOnly: 0, ExpansionPlusAnchor: 0 };
    for (const scenario of SCENARIOS) {
      rates[scenario] = recordFor(tables[scenario], targetYear).retailRatePerKwh;
    }
    return { x: value, rates };
  };

  const points: SensitivityPoint[] = [];
  for (let i = 0; i <= count; i++) {
    points.push(sample(parseFloat((min + i * step).toFixed(5))));
  }
  if (points.length === 0 || points[points.length - 1].x < max) {
    points.push(sample(max));
  }
  return points;
}

export const useSensitivity = (
  params: ParameterSet,
  field: keyof ParameterSet,
  options: SensitivityOptions = {},
): SensitivityPoint[] => {
  const { min, max, step, targetYear } = options;
  return useMemo(
    () => sensitivitySweep(params, field, { min, max, step, targetYear }),
    [params, field, min, max, step, targetYear],
  );
};
