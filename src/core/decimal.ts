import { NumericConversionError } from './errors.js';

/**
 * Fixed-precision decimal backed by a scaled bigint.
 *
 * Every value carries exactly 18 fractional digits. Products and quotients are
 * rounded half away from zero back onto that grid, so the same inputs always
 * produce the same quoted prices, tick after tick.
 */

const PRECISION = 18;
const SCALE = 10n ** BigInt(PRECISION);
const MAX_EXPONENT = 1000;

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export type DecimalLike = Decimal | string | number | bigint;

const abs = (n: bigint): bigint => (n < 0n ? -n : n);

const roundDiv = (numerator: bigint, denominator: bigint): bigint => {
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return quotient;
  if (abs(remainder) * 2n < abs(denominator)) return quotient;
  return (numerator < 0n) !== (denominator < 0n) ? quotient - 1n : quotient + 1n;
};

const assertDigits = (digits: number): void => {
  if (!Number.isInteger(digits) || digits < 0 || digits > PRECISION) {
    throw new RangeError(`digits must be an integer in [0, ${PRECISION}]`);
  }
};

export class Decimal {
  static readonly ZERO = new Decimal(0n);
  static readonly ONE = new Decimal(SCALE);

  private constructor(private readonly units: bigint) {}

  /** Parses plain or exponent notation ("0.002", "-1.5e-7"). */
  static parse(text: string): Decimal {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) throw new NumericConversionError(text);
    const [, sign, intPart = '', fracPart = '', expPart] = match;
    if (intPart === '' && fracPart === '') throw new NumericConversionError(text);

    const exponent = (expPart === undefined ? 0 : Number(expPart)) - fracPart.length;
    if (Math.abs(exponent) > MAX_EXPONENT) throw new NumericConversionError(text, { reason: 'exponent out of range' });

    const digits = BigInt(`${intPart}${fracPart}`);
    const shift = exponent + PRECISION;
    const units = shift >= 0 ? digits * 10n ** BigInt(shift) : roundDiv(digits, 10n ** BigInt(-shift));
    return new Decimal(sign === '-' ? -units : units);
  }

  /**
   * Binary floats go through their shortest round-trip string, never through
   * arithmetic, so 0.1 becomes exactly 0.1.
   */
  static fromNumber(value: number): Decimal {
    if (!Number.isFinite(value)) throw new NumericConversionError(value);
    return Decimal.parse(String(value));
  }

  static from(value: DecimalLike): Decimal {
    if (value instanceof Decimal) return value;
    if (typeof value === 'bigint') return new Decimal(value * SCALE);
    if (typeof value === 'number') return Decimal.fromNumber(value);
    return Decimal.parse(value);
  }

  static min(first: Decimal, ...rest: Decimal[]): Decimal {
    return rest.reduce((acc, d) => (d.lt(acc) ? d : acc), first);
  }

  static max(first: Decimal, ...rest: Decimal[]): Decimal {
    return rest.reduce((acc, d) => (d.gt(acc) ? d : acc), first);
  }

  plus(other: DecimalLike): Decimal {
    return new Decimal(this.units + Decimal.from(other).units);
  }

  minus(other: DecimalLike): Decimal {
    return new Decimal(this.units - Decimal.from(other).units);
  }

  times(other: DecimalLike): Decimal {
    return new Decimal(roundDiv(this.units * Decimal.from(other).units, SCALE));
  }

  div(other: DecimalLike): Decimal {
    const divisor = Decimal.from(other).units;
    if (divisor === 0n) throw new RangeError('decimal division by zero');
    return new Decimal(roundDiv(this.units * SCALE, divisor));
  }

  negated(): Decimal {
    return new Decimal(-this.units);
  }

  clamp(lower: DecimalLike, upper: DecimalLike): Decimal {
    return Decimal.min(Decimal.max(this, Decimal.from(lower)), Decimal.from(upper));
  }

  cmp(other: DecimalLike): -1 | 0 | 1 {
    const rhs = Decimal.from(other).units;
    if (this.units === rhs) return 0;
    return this.units < rhs ? -1 : 1;
  }

  eq(other: DecimalLike): boolean {
    return this.cmp(other) === 0;
  }

  lt(other: DecimalLike): boolean {
    return this.cmp(other) < 0;
  }

  lte(other: DecimalLike): boolean {
    return this.cmp(other) <= 0;
  }

  gt(other: DecimalLike): boolean {
    return this.cmp(other) > 0;
  }

  gte(other: DecimalLike): boolean {
    return this.cmp(other) >= 0;
  }

  isPositive(): boolean {
    return this.units > 0n;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  /** Drops fractional digits beyond `digits`, rounding toward zero. */
  truncate(digits: number): Decimal {
    assertDigits(digits);
    const unit = 10n ** BigInt(PRECISION - digits);
    return new Decimal((this.units / unit) * unit);
  }

  /** Rounds half away from zero to `digits` fractional digits. */
  toFixed(digits: number): string {
    assertDigits(digits);
    const rounded = roundDiv(this.units, 10n ** BigInt(PRECISION - digits));
    const sign = rounded < 0n ? '-' : '';
    const magnitude = abs(rounded).toString().padStart(digits + 1, '0');
    if (digits === 0) return `${sign}${magnitude}`;
    const whole = magnitude.slice(0, magnitude.length - digits);
    const frac = magnitude.slice(magnitude.length - digits);
    return `${sign}${whole}.${frac}`;
  }

  /** Shortest exact representation, no exponent, no trailing zeros. */
  toString(): string {
    const sign = this.units < 0n ? '-' : '';
    const magnitude = abs(this.units);
    const whole = magnitude / SCALE;
    const frac = (magnitude % SCALE).toString().padStart(PRECISION, '0').replace(/0+$/, '');
    return frac === '' ? `${sign}${whole}` : `${sign}${whole}.${frac}`;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toJSON(): string {
    return this.toString();
  }
}
