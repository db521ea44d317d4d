import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MIN_RETAIL_RATE, SCENARIOS, YEARS } from '../constants';
import { DegenerateDivisionError, InvalidParameterError } from '../errors';
import { fingerprintParameters } from '../fingerprint';
import { ScenarioCache, annualDebtService, debtServiceFor, recordFor, runScenarios } from '../hooks/useScenarios';
import { validateCommunityBaseline, validateParameters } from '../validation';
import type { ParameterSet } from '../types';
import { DEFAULTS, approxEq, randomParameters, seededRandom } from './helpers';

function isInvalid(field: string, value?: unknown) {
  return (err: unknown) =>
    err instanceof InvalidParameterError && err.field === field && (value === undefined || err.value === value);
}

describe('annualDebtService', () => {
  it('matches the annuity formula', () => {
    const factor = Math.pow(1.05, 25);
    assert.ok(approxEq(annualDebtService(20_000_000, 0.4, 0.05, 25), (8_000_000 * 0.05 * factor) / (factor - 1)));
  });

  it('pays back the principal plus interest over the term', () => {
    const payment = annualDebtService(1_000, 1, 0.1, 2);
    // 1000 × 0.1 × 1.21 / 0.21
    assert.ok(approxEq(payment, 576.1904761904762));
  });

  it('rejects a zero rate as a degenerate division', () => {
    assert.throws(
      () => annualDebtService(20_000_000, 0.4, 0, 25),
      (err: unknown) => err instanceof DegenerateDivisionError && err.quantity === 'financingRate',
    );
  });

  it('tends to interest-only payments over very long terms', () => {
    // (1 + r)^n overflows at this term; the payment is principal × r.
    assert.ok(approxEq(annualDebtService(20_000_000, 0.4, 0.05, 20_000), 400_000));
  });

  it('tends to straight-line repayment as the rate approaches zero', () => {
    assert.ok(approxEq(annualDebtService(20_000_000, 0.4, 1e-17, 25), 320_000));
  });

  it('rejects a payment that is not finite', () => {
    assert.throws(
      () => annualDebtService(20_000_000, 0.4, Number.MAX_VALUE, 25),
      (err: unknown) => err instanceof DegenerateDivisionError && err.quantity === 'financingRate',
    );
  });

  it('rejects negative rates, bad terms and empty principal', () => {
    assert.throws(() => annualDebtService(20_000_000, 0.4, -0.01, 25), isInvalid('financingRate', -0.01));
    assert.throws(() => annualDebtService(20_000_000, 0.4, 0.05, 0), isInvalid('bondTermYears', 0));
    assert.throws(() => annualDebtService(20_000_000, 0.4, 0.05, 12.5), isInvalid('bondTermYears', 12.5));
    assert.throws(() => annualDebtService(0, 0.4, 0.05, 25), isInvalid('capex', 0));
  });
});

describe('validateParameters', () => {
  it('accepts the defaults unchanged', () => {
    assert.deepEqual(validateParameters(DEFAULTS), DEFAULTS);
  });

  it('names the offending field and value', () => {
    assert.throws(() => validateParameters({ ...DEFAULTS, baseLoadMwh: -5 }), isInvalid('baseLoadMwh', -5));
    assert.throws(() => validateParameters({ ...DEFAULTS, financingRate: 0 }), isInvalid('financingRate', 0));
    assert.throws(() => validateParameters({ ...DEFAULTS, bondTermYears: 0 }), isInvalid('bondTermYears', 0));
    assert.throws(() => validateParameters({ ...DEFAULTS, bondTermYears: 2.5 }), isInvalid('bondTermYears', 2.5));
    assert.throws(() => validateParameters({ ...DEFAULTS, utilityDebtShare: 1.2 }), isInvalid('utilityDebtShare', 1.2));
    assert.throws(() => validateParameters({ ...DEFAULTS, phase2GrowthRate: -1 }), isInvalid('phase2GrowthRate', -1));
  });

  it('rejects a missing field', () => {
    const { capex: _capex, ...withoutCapex } = DEFAULTS;
    assert.throws(() => validateParameters(withoutCapex), isInvalid('capex'));
  });

  it('validates the community baseline', () => {
    assert.throws(
      () => validateCommunityBaseline({ households: 0, householdAnnualKwh: 9_000, localSpendingMultiplier: 1.7, jobsPerMw: 1.5 }),
      isInvalid('households', 0),
    );
  });
});

describe('runScenarios', () => {
  it('fails the whole run on an invalid field', () => {
    assert.throws(() => runScenarios({ ...DEFAULTS, financingRate: 0 }), isInvalid('financingRate', 0));
    assert.throws(() => runScenarios({ ...DEFAULTS, dieselFloorMwh: 100_000 }), isInvalid('dieselFloorMwh', 100_000));
  });

  it('is deterministic for random parameter sets', () => {
    const random = seededRandom(2023);
    for (let i = 0; i < 40; i++) {
      const params = randomParameters(random);
      assert.deepEqual(runScenarios(params), runScenarios({ ...params }));
    }
  });

  it('activates debt service exactly from the expansion year', () => {
    const random = seededRandom(11);
    for (let i = 0; i < 20; i++) {
      const params = randomParameters(random);
      const ds = debtServiceFor(params);
      const tables = runScenarios(params);
      for (const year of YEARS) {
        assert.equal(recordFor(tables.StatusQuo, year).debtService, 0);
        for (const scenario of ['ExpansionOnly', 'ExpansionPlusAnchor'] as const) {
          assert.equal(recordFor(tables[scenario], year).debtService, year >= params.expansionYear ? ds : 0);
        }
      }
    }
  });

  it('gives identical start years across scenarios before the expansion', () => {
    const tables = runScenarios(DEFAULTS);
    for (const scenario of SCENARIOS) {
      assert.deepEqual(recordFor(tables[scenario], 2026), recordFor(tables.StatusQuo, 2026));
    }
  });

  it('keeps every rate finite and floored at numeric extremes', () => {
    for (const params of [
      { ...DEFAULTS, bondTermYears: 20_000 },
      { ...DEFAULTS, financingRate: 1e-17 },
    ]) {
      const tables = runScenarios(params);
      for (const scenario of SCENARIOS) {
        for (const record of tables[scenario]) {
          assert.ok(Number.isFinite(record.debtService), `${scenario} ${record.year} debt ${record.debtService}`);
          assert.ok(record.retailRatePerKwh >= MIN_RETAIL_RATE, `${scenario} ${record.year} rate ${record.retailRatePerKwh}`);
        }
      }
    }
  });

  it('rejects a year outside the table', () => {
    const tables = runScenarios(DEFAULTS);
    assert.throws(() => recordFor(tables.StatusQuo, 2036), isInvalid('year', 2036));
  });
});

describe('ScenarioCache', () => {
  it('reuses results for the same parameter values in any key order', () => {
    const cache = new ScenarioCache();
    const first = cache.run(DEFAULTS);
    const { baseLoadMwh, ...rest } = DEFAULTS;
    const reordered: ParameterSet = { ...rest, baseLoadMwh };
    assert.equal(fingerprintParameters(reordered), fingerprintParameters(DEFAULTS));
    assert.equal(cache.run(reordered), first);
    assert.equal(cache.size, 1);
  });

  it('computes a new entry when any value changes', () => {
    const cache = new ScenarioCache();
    const first = cache.run(DEFAULTS);
    const second = cache.run({ ...DEFAULTS, anchorTariffPerMwh: 130 });
    assert.notEqual(second, first);
    assert.equal(cache.size, 2);
    cache.clear();
    assert.equal(cache.size, 0);
  });

  it('does not store failed runs', () => {
    const cache = new ScenarioCache();
    assert.throws(() => cache.run({ ...DEFAULTS, capex: -1 }), isInvalid('capex', -1));
    assert.equal(cache.size, 0);
  });
});
