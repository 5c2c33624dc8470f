export type Rational = readonly [numerator: number, denominator: number];

export interface DmsRationals {
  degrees: Rational;
  minutes: Rational;
  seconds: Rational;
  negative: boolean;
}

export const SECONDS_MAX_DENOMINATOR = 10_000;

/**
 * Closest fraction to `value` whose denominator does not exceed
 * `maxDenominator`, walking the continued-fraction convergents and
 * checking the last semiconvergent.
 */
export const limitDenominator = (value: number, maxDenominator = SECONDS_MAX_DENOMINATOR): Rational => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot approximate non-finite value ${value}`);
  }
  if (Number.isInteger(value)) {
    return [value, 1];
  }

  let p0 = 0;
  let q0 = 1;
  let p1 = 1;
  let q1 = 0;
  let x = value;
  for (;;) {
    const a = Math.floor(x);
    const q2 = q0 + a * q1;
    if (q2 > maxDenominator) {
      break;
    }
    [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
    const remainder = x - a;
    if (remainder < 1e-9) {
      return [p1, q1];
    }
    x = 1 / remainder;
  }

  const k = Math.floor((maxDenominator - q0) / q1);
  const lower: Rational = [p0 + k * p1, q0 + k * q1];
  const upper: Rational = [p1, q1];
  return Math.abs(upper[0] / upper[1] - value) <= Math.abs(lower[0] / lower[1] - value) ? upper : lower;
};

export const toDmsRationals = (value: number): DmsRationals => {
  const absolute = Math.abs(value);
  const degrees = Math.floor(absolute);
  const minutesFloat = (absolute - degrees) * 60;
  const minutes = Math.floor(minutesFloat);
  const seconds = (minutesFloat - minutes) * 60;
  return {
    degrees: [degrees, 1],
    minutes: [minutes, 1],
    seconds: limitDenominator(seconds),
    negative: value < 0
  };
};

// libvips reads multi-component rationals as space separated "n/d" pairs.
export const formatRationals = ({ degrees, minutes, seconds }: DmsRationals): string =>
  [degrees, minutes, seconds].map(([n, d]) => `${n}/${d}`).join(' ');

export const latitudeRef = (latitude: number): 'N' | 'S' => (latitude < 0 ? 'S' : 'N');

export const longitudeRef = (longitude: number): 'E' | 'W' => (longitude < 0 ? 'W' : 'E');

export const isValidCoordinatePair = (latitude: number, longitude: number): boolean =>
  Number.isFinite(latitude) && Number.isFinite(longitude) && Math.abs(latitude) <= 90 && Math.abs(longitude) <= 180;
