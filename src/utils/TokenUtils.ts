import { ethers } from 'ethers';
import BigNumber from 'bignumber.js';
import { WAD } from './Constants';
import { mulDiv, Rounding } from './FixedPointMath';

/**
 * Normalize a token amount to its decimal value
 * @param amount amount string or bigint
 * @param decimals default to 18
 * @returns
 */
export function norm(amount: bigint | string | number, decimals = 18) {
  return Number(ethers.formatUnits(amount, decimals));
}

/**
 * Parse a human readable amount ("1.944") to raw token units
 */
export function toRaw(amount: string, decimals: number): bigint {
  return ethers.parseUnits(amount, decimals);
}

/**
 * Value, in the common 18-decimal base, of `amount` raw units of an asset priced by a feed.
 *
 * amount has `assetDecimals` decimals, price has `priceDecimals` decimals (each feed its own).
 * Every collateral/debt comparison in the engine goes through this function.
 *
 * @example 2 ETH (18 dec) at 3000 (8 dec feed) => 6000e18
 */
export function ToBaseValue(
  amount: bigint,
  assetDecimals: number,
  price: bigint,
  priceDecimals: number,
  rounding: Rounding = Rounding.DOWN
): bigint {
  return mulDiv(amount * price, WAD, 10n ** BigInt(assetDecimals + priceDecimals), rounding);
}

/**
 * Inverse of ToBaseValue: raw units of an asset worth `value` (18-decimal base)
 */
export function FromBaseValue(
  value: bigint,
  assetDecimals: number,
  price: bigint,
  priceDecimals: number,
  rounding: Rounding = Rounding.DOWN
): bigint {
  return mulDiv(value, 10n ** BigInt(assetDecimals + priceDecimals), price * WAD, rounding);
}

/**
 * Rescale a fixed point number from one decimal count to another
 */
export function Rescale(amount: bigint, fromDecimals: number, toDecimals: number, rounding = Rounding.DOWN): bigint {
  if (fromDecimals == toDecimals) {
    return amount;
  }
  if (toDecimals > fromDecimals) {
    return amount * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return mulDiv(amount, 1n, 10n ** BigInt(fromDecimals - toDecimals), rounding);
}

export function WadToBigNumber(wad: bigint): BigNumber {
  return new BigNumber(wad.toString()).div(new BigNumber(WAD.toString()));
}
