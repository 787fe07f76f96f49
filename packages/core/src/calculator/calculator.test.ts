import { describe, it, expect } from 'vitest';
import SunCalc from 'suncalc';
import {
  DatedCalculator,
  InitializedCalculator,
  PrayerCalculator,
  calculatePrayerTimes,
} from './calculator.js';
import { TARGETS } from '../domain/targets.js';
import type { Target, TargetTime } from '../domain/types.js';
import type { CalculatorConfig } from '../domain/validation.js';
import type { CivilDate } from '../time/civilDate.js';

const MECCA: CalculatorConfig = {
  latitude: 21.4225,
  longitude: 39.8262,
  elevation: 0,
  calculationMethod: 'mwl',
  asrConvention: 'shafii',
  preciseToSeconds: true,
};

const MECCA_DATE: CivilDate = { year: 2024, month: 6, day: 15, timeZone: 'Asia/Riyadh' };

function dated(config: CalculatorConfig, date: CivilDate): DatedCalculator {
  return new PrayerCalculator(config).init().setDate(date);
}

function timeOf(result: TargetTime): Date {
  if (!result.available) {
    throw new Error('expected the target to be available');
  }
  return result.time;
}

function expectNear(actual: Date | undefined, expectedIso: string, toleranceSeconds: number) {
  expect(actual).toBeDefined();
  const diffMs = Math.abs((actual?.getTime() ?? Number.NaN) - new Date(expectedIso).getTime());
  expect(diffMs).toBeLessThanOrEqual(toleranceSeconds * 1000);
}

describe('PrayerCalculator lifecycle', () => {
  it('moves from configured to initialized to dated', () => {
    const initialized = new PrayerCalculator(MECCA).init();
    expect(initialized).toBeInstanceOf(InitializedCalculator);
    expect(initialized.settings.fajrAngle.toNumber()).toBe(18);
    expect(initialized.settings.ishaAngle.toNumber()).toBe(17);

    const calculator = initialized.setDate(MECCA_DATE);
    expect(calculator).toBeInstanceOf(DatedCalculator);
    expect(calculator.snapshot.date).toEqual(MECCA_DATE);
  });

  it('rejects a malformed configuration', () => {
    expect(() => new PrayerCalculator({ latitude: 21.4, longitude: Number.NaN })).toThrow();
  });

  it('rejects an unknown time zone', () => {
    const initialized = new PrayerCalculator(MECCA).init();
    expect(() => initialized.setDate({ ...MECCA_DATE, timeZone: 'Asia/Nowhere' })).toThrow(
      'timeZone must be a valid IANA time zone',
    );
  });

  it('does not carry state from one date into the next', () => {
    const initialized = new PrayerCalculator(MECCA).init();
    const winter = initialized.setDate({ ...MECCA_DATE, month: 12, day: 21 });
    const backToJune = winter.setDate(MECCA_DATE);
    const fresh = initialized.setDate(MECCA_DATE);

    for (const target of TARGETS) {
      expect(timeOf(backToJune.calculate(target)).getTime()).toBe(
        timeOf(fresh.calculate(target)).getTime(),
      );
    }
    expect(timeOf(winter.calculate('maghrib')).getUTCDate()).toBe(21);
  });
});

describe('DatedCalculator.calculate', () => {
  const calculator = dated(MECCA, MECCA_DATE);

  it('computes the Mecca timetable', () => {
    expectNear(timeOf(calculator.calculate('fajr')), '2024-06-15T01:13:02Z', 60);
    expectNear(timeOf(calculator.calculate('sunrise')), '2024-06-15T02:38:19Z', 60);
    expectNear(timeOf(calculator.calculate('zuhr')), '2024-06-15T09:21:17Z', 60);
    expectNear(timeOf(calculator.calculate('asr')), '2024-06-15T12:40:53Z', 60);
    expectNear(timeOf(calculator.calculate('maghrib')), '2024-06-15T16:04:19Z', 60);
    expectNear(timeOf(calculator.calculate('isha')), '2024-06-15T17:24:24Z', 60);
  });

  it('places zuhr between fajr and asr, and asr between zuhr and maghrib', () => {
    const fajr = timeOf(calculator.calculate('fajr')).getTime();
    const zuhr = timeOf(calculator.calculate('zuhr')).getTime();
    const asr = timeOf(calculator.calculate('asr')).getTime();
    const maghrib = timeOf(calculator.calculate('maghrib')).getTime();

    expect(zuhr).toBeGreaterThan(fajr);
    expect(zuhr).toBeLessThan(asr);
    expect(asr).toBeGreaterThan(zuhr);
    expect(asr).toBeLessThan(maghrib);
  });

  it('keeps the targets in chronological order', () => {
    const times = TARGETS.map((target) => timeOf(calculator.calculate(target)).getTime());
    const sorted = [...times].sort((a, b) => a - b);
    expect(times).toEqual(sorted);
  });

  it('moves asr later under the hanafi convention', () => {
    const hanafi = dated({ ...MECCA, asrConvention: 'hanafi' }, MECCA_DATE);
    expectNear(timeOf(hanafi.calculate('asr')), '2024-06-15T14:00:08Z', 60);
    expect(timeOf(hanafi.calculate('asr')).getTime()).toBeGreaterThan(
      timeOf(calculator.calculate('asr')).getTime(),
    );
  });

  it('rounds to the minute unless precise to seconds', () => {
    const rounded = dated({ ...MECCA, preciseToSeconds: false }, MECCA_DATE);
    const iso = TARGETS.map((target) => timeOf(rounded.calculate(target)).toISOString());
    expect(iso).toEqual([
      '2024-06-15T01:13:00.000Z',
      '2024-06-15T02:38:00.000Z',
      '2024-06-15T09:21:00.000Z',
      '2024-06-15T12:41:00.000Z',
      '2024-06-15T16:04:00.000Z',
      '2024-06-15T17:24:00.000Z',
    ]);
  });

  it('agrees with suncalc on sunrise and sunset', () => {
    const greenwich = dated(
      { latitude: 51.4779, longitude: -0.0015, preciseToSeconds: true },
      { year: 2024, month: 3, day: 20, timeZone: 'Europe/London' },
    );
    const reference = SunCalc.getTimes(new Date('2024-03-20T12:00:00Z'), 51.4779, -0.0015);

    expectNear(timeOf(greenwich.calculate('sunrise')), reference.sunrise.toISOString(), 120);
    expectNear(timeOf(greenwich.calculate('maghrib')), reference.sunset.toISOString(), 120);
  });
});

describe('corrections', () => {
  const base = dated(MECCA, MECCA_DATE);

  it('shifts a target by its angle correction at 15 degrees per hour', () => {
    const corrected = dated({ ...MECCA, angleCorrections: { zuhr: 1.5 } }, MECCA_DATE);
    expect(
      timeOf(corrected.calculate('zuhr')).getTime() - timeOf(base.calculate('zuhr')).getTime(),
    ).toBe(6 * 60 * 1000);
  });

  it('shifts a target by its time correction', () => {
    const corrected = dated({ ...MECCA, timeCorrectionsMs: { zuhr: 3 * 60 * 1000 } }, MECCA_DATE);
    expect(
      timeOf(corrected.calculate('zuhr')).getTime() - timeOf(base.calculate('zuhr')).getTime(),
    ).toBe(3 * 60 * 1000);
  });

  it('leaves uncorrected targets alone', () => {
    const corrected = dated(
      { ...MECCA, angleCorrections: { fajr: 2 }, timeCorrectionsMs: { isha: 60_000 } },
      MECCA_DATE,
    );
    expect(timeOf(corrected.calculate('maghrib')).getTime()).toBe(
      timeOf(base.calculate('maghrib')).getTime(),
    );
  });

  it('moves a refined target by roughly its correction', () => {
    const corrected = dated({ ...MECCA, timeCorrectionsMs: { fajr: -2 * 60 * 1000 } }, MECCA_DATE);
    const shiftMs =
      timeOf(corrected.calculate('fajr')).getTime() - timeOf(base.calculate('fajr')).getTime();
    expect(Math.abs(shiftMs + 2 * 60 * 1000)).toBeLessThanOrEqual(2000);
  });
});

describe('fixed Maghrib-to-Isha duration', () => {
  it('adds the method duration to maghrib', () => {
    const ummAlQura = dated({ ...MECCA, calculationMethod: 'ummAlQura' }, MECCA_DATE);
    const maghrib = timeOf(ummAlQura.calculate('maghrib'));
    const isha = timeOf(ummAlQura.calculate('isha'));
    expect(isha.getTime() - maghrib.getTime()).toBe(90 * 60 * 1000);
  });

  it('adds an explicit duration to maghrib', () => {
    const custom = dated({ ...MECCA, maghribDurationMs: 75 * 60 * 1000 }, MECCA_DATE);
    const maghrib = timeOf(custom.calculate('maghrib'));
    const isha = timeOf(custom.calculate('isha'));
    expect(isha.getTime() - maghrib.getTime()).toBe(75 * 60 * 1000);
  });

  it('is unavailable when maghrib is', () => {
    const polar = dated(
      { latitude: 78.2232, longitude: 15.6267, calculationMethod: 'ummAlQura' },
      { year: 2024, month: 6, day: 21, timeZone: 'UTC' },
    );
    expect(polar.calculate('maghrib')).toEqual({ available: false });
    expect(polar.calculate('isha')).toEqual({ available: false });
  });
});

describe('availability', () => {
  it.each<[string, CalculatorConfig, CivilDate]>([
    ['Mecca', MECCA, MECCA_DATE],
    [
      'Greenwich at the equinox',
      { latitude: 51.4779, longitude: -0.0015 },
      { year: 2024, month: 3, day: 20, timeZone: 'Europe/London' },
    ],
    [
      'Cape Town in winter',
      { latitude: -33.9249, longitude: 18.4241 },
      { year: 2024, month: 6, day: 21, timeZone: 'Africa/Johannesburg' },
    ],
    [
      'Jakarta',
      { latitude: -6.2088, longitude: 106.8456, calculationMethod: 'kemenag' },
      { year: 2024, month: 1, day: 10, timeZone: 'Asia/Jakarta' },
    ],
  ])('calculates every target in %s', (_name, config, date) => {
    const calculator = dated(config, date);
    for (const target of TARGETS) {
      expect(calculator.calculate(target).available).toBe(true);
    }
  });

  it('loses twilight but keeps zuhr under the midnight sun', () => {
    const svalbard = dated(
      { latitude: 78.2232, longitude: 15.6267, preciseToSeconds: true },
      { year: 2024, month: 6, day: 21, timeZone: 'UTC' },
    );
    expect(svalbard.calculate('fajr')).toEqual({ available: false });
    expect(svalbard.calculate('isha')).toEqual({ available: false });
    expect(svalbard.calculate('sunrise')).toEqual({ available: false });
    expect(svalbard.calculate('maghrib')).toEqual({ available: false });
    expectNear(timeOf(svalbard.calculate('zuhr')), '2024-06-21T10:59:25Z', 60);
  });

  it('still resolves asr below the horizon during polar night', () => {
    const svalbard = dated(
      { latitude: 78.2232, longitude: 15.6267, preciseToSeconds: true },
      { year: 2024, month: 12, day: 21, timeZone: 'UTC' },
    );
    expect(svalbard.calculate('sunrise')).toEqual({ available: false });
    expect(svalbard.calculate('maghrib')).toEqual({ available: false });

    const asr = timeOf(svalbard.calculate('asr'));
    expect(asr.getTime()).toBeGreaterThan(timeOf(svalbard.calculate('zuhr')).getTime());
    expectNear(asr, '2024-12-21T13:47:00Z', 120);
  });
});

describe('DatedCalculator.calculateAll', () => {
  it('returns every target in order when all are available', () => {
    const times = dated(MECCA, MECCA_DATE).calculateAll();
    expect([...times.keys()]).toEqual(TARGETS);
  });

  it('omits unavailable targets', () => {
    const times = dated(
      { latitude: 78.2232, longitude: 15.6267 },
      { year: 2024, month: 6, day: 21, timeZone: 'UTC' },
    ).calculateAll();
    expect([...times.keys()]).toEqual(['zuhr', 'asr']);
  });

  it('agrees with calculate for each target', () => {
    const cases: Array<[CalculatorConfig, CivilDate]> = [
      [MECCA, MECCA_DATE],
      [
        { latitude: 59.9, longitude: 10.75 },
        { year: 2024, month: 6, day: 21, timeZone: 'Europe/Oslo' },
      ],
      [
        { latitude: 78.2232, longitude: 15.6267 },
        { year: 2024, month: 12, day: 21, timeZone: 'UTC' },
      ],
    ];

    for (const [config, date] of cases) {
      const calculator = dated(config, date);
      const all = calculator.calculateAll();
      for (const target of TARGETS) {
        const single = calculator.calculate(target);
        if (single.available) {
          expect(all.get(target)?.getTime()).toBe(single.time.getTime());
        } else {
          expect(all.has(target)).toBe(false);
        }
      }
    }
  });
});

describe('elevation correction', () => {
  const elevated: CalculatorConfig = { ...MECCA, elevation: 500 };
  const withDip = dated(elevated, MECCA_DATE);
  const withoutDip = dated({ ...elevated, ignoreElevation: true }, MECCA_DATE);

  it('moves sunrise earlier and maghrib later', () => {
    expect(timeOf(withDip.calculate('sunrise')).getTime()).toBeLessThan(
      timeOf(withoutDip.calculate('sunrise')).getTime(),
    );
    expect(timeOf(withDip.calculate('maghrib')).getTime()).toBeGreaterThan(
      timeOf(withoutDip.calculate('maghrib')).getTime(),
    );
  });

  it.each<Target>(['fajr', 'zuhr', 'asr', 'isha'])('does not change %s', (target) => {
    expect(timeOf(withDip.calculate(target)).getTime()).toBe(
      timeOf(withoutDip.calculate(target)).getTime(),
    );
  });
});

describe('calculatePrayerTimes', () => {
  it('matches the staged calculator', () => {
    const oneShot = calculatePrayerTimes(MECCA, MECCA_DATE);
    const staged = dated(MECCA, MECCA_DATE).calculateAll();
    expect(oneShot).toEqual(staged);
  });
});
