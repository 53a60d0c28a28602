import { BPS, IS_RELEASE_BUILD } from './Constants';
import { InvariantViolationError } from './Errors';
import { Err } from './Logger';

export enum Rounding {
  DOWN = 'down',
  UP = 'up'
}

/**
 * a * b / denominator with the full-precision product, rounded as requested
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint, rounding: Rounding = Rounding.DOWN): bigint {
  if (denominator == 0n) {
    throw new InvariantViolationError('mulDiv by zero');
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new InvariantViolationError(`mulDiv on negative operand: ${a} * ${b} / ${denominator}`);
  }

  const product = a * b;
  const quotient = product / denominator;
  if (rounding == Rounding.UP && product % denominator != 0n) {
    return quotient + 1n;
  }
  return quotient;
}

export function bpsMul(amount: bigint, bps: bigint | number, rounding: Rounding = Rounding.DOWN): bigint {
  return mulDiv(amount, BigInt(bps), BPS, rounding);
}

/**
 * x^n in fixed point with the given base (WAD or RAY), exponentiation by squaring.
 * Intermediate products are rounded half up, as the MakerDAO `rpow` does.
 */
export function rpow(x: bigint, n: bigint | number, base: bigint): bigint {
  let exponent = BigInt(n);
  if (exponent < 0n) {
    throw new InvariantViolationError(`rpow with negative exponent ${exponent}`);
  }
  if (x == 0n) {
    return exponent == 0n ? base : 0n;
  }

  const half = base / 2n;
  let result = exponent % 2n == 1n ? x : base;
  let acc = x;
  exponent /= 2n;
  while (exponent > 0n) {
    acc = (acc * acc + half) / base;
    if (exponent % 2n == 1n) {
      result = (result * acc + half) / base;
    }
    exponent /= 2n;
  }

  return result;
}

/**
 * Integer square root (floor), newton iteration
 */
export function sqrt(y: bigint): bigint {
  if (y < 0n) {
    throw new InvariantViolationError(`sqrt of negative ${y}`);
  }
  if (y < 2n) {
    return y;
  }

  let z = y;
  let x = y / 2n + 1n;
  while (x < z) {
    z = x;
    x = (y / x + x) / 2n;
  }
  return z;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function absBigInt(a: bigint): bigint {
  return a < 0n ? -a : a;
}

/**
 * a - b, refusing to go negative
 */
export function checkedSub(a: bigint, b: bigint, label: string): bigint {
  const result = a - b;
  assertInvariant(result >= 0n, `${label} would become negative (${a} - ${b})`);
  return result;
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (condition) {
    return;
  }

  if (!IS_RELEASE_BUILD) {
    Err(`assertInvariant: ${message}`);
  }
  throw new InvariantViolationError(message);
}
