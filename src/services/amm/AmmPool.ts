import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { AmmObservation, AmmPoolState, LiquidityResult, SwapResult } from '../../model/AmmPool';
import { BPS, MINIMUM_LIQUIDITY, WAD } from '../../utils/Constants';
import {
  InsufficientBalanceError,
  InsufficientLiquidityError,
  InvalidAmountError,
  OracleNoDataError,
  SlippageExceededError
} from '../../utils/Errors';
import { assertInvariant, checkedSub, minBigInt, mulDiv, Rounding, sqrt } from '../../utils/FixedPointMath';
import { Debug, Log } from '../../utils/Logger';
import { ReentrancyGuard } from '../../utils/ReentrancyGuard';
import { norm } from '../../utils/TokenUtils';
import { DeepCopy } from '../../utils/Utils';
import { TokenLedger } from '../ledger/TokenLedger';

// holder of the first MINIMUM_LIQUIDITY shares, which can never be redeemed
export const LOCKED_SHARES_HOLDER = 'amm:locked';

export function GetPoolAccount(poolId: string) {
  return `amm:${poolId}`;
}

interface SwapSide {
  reserveIn: bigint;
  reserveOut: bigint;
  assetOut: string;
  isAIn: boolean;
}

/**
 * Constant product pool (x * y = k) with a fee on the input amount.
 * Reserves are tracked internally, tokens sent to the pool account without a call are not counted.
 */
export class AmmPool implements Checkpointable<AmmPoolState> {
  private state: AmmPoolState;
  private readonly guard: ReentrancyGuard;

  constructor(
    private readonly ledger: TokenLedger,
    state: AmmPoolState
  ) {
    this.state = DeepCopy(state);
    this.guard = new ReentrancyGuard(`amm pool ${state.id}`);
  }

  get id() {
    return this.state.id;
  }

  get account() {
    return GetPoolAccount(this.state.id);
  }

  get assets(): [string, string] {
    return [this.state.assetA, this.state.assetB];
  }

  getReserves(): { reserveA: bigint; reserveB: bigint } {
    return { reserveA: this.state.reserveA, reserveB: this.state.reserveB };
  }

  sharesOf(provider: string): bigint {
    return this.state.shares[provider] ?? 0n;
  }

  get totalShares() {
    return this.state.totalShares;
  }

  quoteExactIn(assetIn: string, amountIn: bigint): bigint {
    const side = this.getSide(assetIn);
    return getAmountOut(amountIn, side.reserveIn, side.reserveOut, this.state.feeBps);
  }

  quoteExactOut(assetIn: string, amountOut: bigint): bigint {
    const side = this.getSide(assetIn);
    return getAmountIn(amountOut, side.reserveIn, side.reserveOut, this.state.feeBps);
  }

  swapExactIn(
    ctx: ExecutionContext,
    assetIn: string,
    amountIn: bigint,
    minAmountOut: bigint,
    recipient = ctx.callerId
  ): SwapResult {
    return this.guard.run(() => {
      if (amountIn <= 0n) {
        throw new InvalidAmountError(`swap input must be positive, got ${amountIn}`);
      }
      const side = this.getSide(assetIn);
      this.updateAccumulators(ctx.timestamp);

      const received = this.ledger.transferAndMeasure(assetIn, ctx.callerId, this.account, amountIn);
      const amountOut = getAmountOut(received, side.reserveIn, side.reserveOut, this.state.feeBps);
      if (amountOut < minAmountOut) {
        throw new SlippageExceededError(`swap output ${amountOut} below minimum ${minAmountOut}`);
      }

      return this.settleSwap(side, assetIn, received, amountOut, recipient);
    });
  }

  swapExactOut(
    ctx: ExecutionContext,
    assetIn: string,
    amountOut: bigint,
    maxAmountIn: bigint,
    recipient = ctx.callerId
  ): SwapResult {
    return this.guard.run(() => {
      if (amountOut <= 0n) {
        throw new InvalidAmountError(`swap output must be positive, got ${amountOut}`);
      }
      const side = this.getSide(assetIn);
      const amountIn = getAmountIn(amountOut, side.reserveIn, side.reserveOut, this.state.feeBps);
      if (amountIn > maxAmountIn) {
        throw new SlippageExceededError(`swap input ${amountIn} above maximum ${maxAmountIn}`);
      }
      this.updateAccumulators(ctx.timestamp);

      const received = this.ledger.transferAndMeasure(assetIn, ctx.callerId, this.account, amountIn);
      if (received < amountIn) {
        // fee-on-transfer input: what arrived must still pay for the requested output
        const affordable = getAmountOut(received, side.reserveIn, side.reserveOut, this.state.feeBps);
        if (affordable < amountOut) {
          throw new SlippageExceededError(`pool received ${received} of ${amountIn}, not enough for ${amountOut}`);
        }
      }

      return this.settleSwap(side, assetIn, received, amountOut, recipient);
    });
  }

  addLiquidity(ctx: ExecutionContext, amountADesired: bigint, amountBDesired: bigint, minShares: bigint): LiquidityResult {
    return this.guard.run(() => {
      if (amountADesired <= 0n || amountBDesired <= 0n) {
        throw new InvalidAmountError('liquidity amounts must be positive');
      }
      this.updateAccumulators(ctx.timestamp);

      const { reserveA, reserveB, totalShares } = this.state;
      let amountA = amountADesired;
      let amountB = amountBDesired;
      if (totalShares > 0n) {
        const amountBOptimal = mulDiv(amountADesired, reserveB, reserveA);
        if (amountBOptimal <= amountBDesired) {
          amountB = amountBOptimal;
        } else {
          amountA = mulDiv(amountBDesired, reserveA, reserveB);
        }
      }

      const receivedA = this.ledger.transferAndMeasure(this.state.assetA, ctx.callerId, this.account, amountA);
      const receivedB = this.ledger.transferAndMeasure(this.state.assetB, ctx.callerId, this.account, amountB);

      let shares: bigint;
      if (totalShares == 0n) {
        const root = sqrt(receivedA * receivedB);
        if (root <= MINIMUM_LIQUIDITY) {
          throw new InsufficientLiquidityError(`initial liquidity too small: sqrt(a*b) = ${root}`);
        }
        shares = root - MINIMUM_LIQUIDITY;
        this.creditShares(LOCKED_SHARES_HOLDER, MINIMUM_LIQUIDITY);
      } else {
        shares = minBigInt(mulDiv(receivedA, totalShares, reserveA), mulDiv(receivedB, totalShares, reserveB));
      }

      if (shares == 0n) {
        throw new InsufficientLiquidityError('liquidity deposit mints no shares');
      }
      if (shares < minShares) {
        throw new SlippageExceededError(`liquidity deposit mints ${shares} shares, minimum ${minShares}`);
      }

      this.creditShares(ctx.callerId, shares);
      this.state.reserveA += receivedA;
      this.state.reserveB += receivedB;

      Log(
        `AmmPool[${this.id}]: ${ctx.callerId} added ${receivedA} ${this.state.assetA} / ${receivedB} ${this.state.assetB} for ${shares} shares`
      );
      return { amountA: receivedA, amountB: receivedB, shares };
    });
  }

  removeLiquidity(ctx: ExecutionContext, shares: bigint, minAmountA: bigint, minAmountB: bigint): LiquidityResult {
    return this.guard.run(() => {
      if (shares <= 0n) {
        throw new InvalidAmountError(`shares to burn must be positive, got ${shares}`);
      }
      const held = this.sharesOf(ctx.callerId);
      if (held < shares) {
        throw new InsufficientBalanceError(`${this.id} shares`, ctx.callerId, shares, held);
      }
      this.updateAccumulators(ctx.timestamp);

      const { reserveA, reserveB, totalShares } = this.state;
      const amountA = mulDiv(shares, reserveA, totalShares);
      const amountB = mulDiv(shares, reserveB, totalShares);
      if (amountA == 0n && amountB == 0n) {
        throw new InsufficientLiquidityError(`${shares} shares redeem nothing`);
      }
      if (amountA < minAmountA || amountB < minAmountB) {
        throw new SlippageExceededError(`liquidity withdrawal ${amountA}/${amountB} below minimum ${minAmountA}/${minAmountB}`);
      }

      this.state.shares[ctx.callerId] = held - shares;
      if (this.state.shares[ctx.callerId] == 0n) {
        delete this.state.shares[ctx.callerId];
      }
      this.state.totalShares = checkedSub(totalShares, shares, `${this.id} total shares`);
      this.state.reserveA = checkedSub(reserveA, amountA, `${this.id} reserve A`);
      this.state.reserveB = checkedSub(reserveB, amountB, `${this.id} reserve B`);

      this.ledger.transfer(this.state.assetA, this.account, ctx.callerId, amountA);
      this.ledger.transfer(this.state.assetB, this.account, ctx.callerId, amountB);

      Log(`AmmPool[${this.id}]: ${ctx.callerId} removed ${shares} shares for ${amountA} / ${amountB}`);
      return { amountA, amountB, shares };
    });
  }

  /**
   * Time weighted price of `asset` in units of the other asset (raw units, wad scaled), over at least
   * `window` seconds ending now. Uses the newest observation at or before `now - window`.
   */
  consultTwap(ctx: ExecutionContext, asset: string, window: number): { price: bigint; updatedAt: number } {
    const isA = this.getSide(asset).isAIn;
    const target = ctx.timestamp - window;

    let reference: AmmObservation | undefined;
    for (const observation of this.state.observations) {
      if (observation.timestamp <= target && (!reference || observation.timestamp > reference.timestamp)) {
        reference = observation;
      }
    }
    if (!reference || window <= 0) {
      throw new OracleNoDataError(asset, `pool ${this.id} has no observation ${window}s old`);
    }

    const [cumulativeA, cumulativeB] = this.cumulativesAt(ctx.timestamp);
    const elapsed = BigInt(ctx.timestamp - reference.timestamp);
    const price = isA
      ? (cumulativeA - reference.priceACumulative) / elapsed
      : (cumulativeB - reference.priceBCumulative) / elapsed;

    return { price, updatedAt: ctx.timestamp };
  }

  snapshot(): AmmPoolState {
    return DeepCopy(this.state);
  }

  restore(state: AmmPoolState) {
    this.state = DeepCopy(state);
  }

  private settleSwap(side: SwapSide, assetIn: string, amountIn: bigint, amountOut: bigint, recipient: string): SwapResult {
    if (amountOut == 0n) {
      throw new InsufficientLiquidityError(`swap of ${amountIn} ${assetIn} yields nothing`);
    }
    if (amountOut >= side.reserveOut) {
      throw new InsufficientLiquidityError(`swap would drain the ${side.assetOut} reserve`);
    }

    const kBefore = this.state.reserveA * this.state.reserveB;
    if (side.isAIn) {
      this.state.reserveA += amountIn;
      this.state.reserveB -= amountOut;
    } else {
      this.state.reserveB += amountIn;
      this.state.reserveA -= amountOut;
    }
    assertInvariant(
      this.state.reserveA * this.state.reserveB >= kBefore,
      `pool ${this.id} k decreased on swap of ${amountIn} ${assetIn}`
    );

    this.ledger.transfer(side.assetOut, this.account, recipient, amountOut);

    const decimalsIn = this.ledger.decimalsOf(assetIn);
    const decimalsOut = this.ledger.decimalsOf(side.assetOut);
    Log(
      `AmmPool[${this.id}]: swapped ${norm(amountIn, decimalsIn)} ${assetIn} for ${norm(amountOut, decimalsOut)} ${side.assetOut}`
    );
    return { poolId: this.id, assetIn, assetOut: side.assetOut, amountIn, amountOut };
  }

  private getSide(assetIn: string): SwapSide {
    if (assetIn == this.state.assetA) {
      return { reserveIn: this.state.reserveA, reserveOut: this.state.reserveB, assetOut: this.state.assetB, isAIn: true };
    }
    if (assetIn == this.state.assetB) {
      return { reserveIn: this.state.reserveB, reserveOut: this.state.reserveA, assetOut: this.state.assetA, isAIn: false };
    }
    throw new InvalidAmountError(`asset ${assetIn} is not traded by pool ${this.id}`);
  }

  private creditShares(provider: string, shares: bigint) {
    this.state.shares[provider] = (this.state.shares[provider] ?? 0n) + shares;
    this.state.totalShares += shares;
  }

  private cumulativesAt(timestamp: number): [bigint, bigint] {
    const { reserveA, reserveB } = this.state;
    if (timestamp <= this.state.lastUpdate || reserveA == 0n || reserveB == 0n) {
      return [this.state.priceACumulative, this.state.priceBCumulative];
    }

    const elapsed = BigInt(timestamp - this.state.lastUpdate);
    return [
      this.state.priceACumulative + mulDiv(reserveB, WAD, reserveA) * elapsed,
      this.state.priceBCumulative + mulDiv(reserveA, WAD, reserveB) * elapsed
    ];
  }

  // first mutation at a new timestamp: accumulate with the pre trade reserves and record an observation
  private updateAccumulators(timestamp: number) {
    if (timestamp == this.state.lastUpdate) {
      return;
    }

    const [cumulativeA, cumulativeB] = this.cumulativesAt(timestamp);
    this.state.priceACumulative = cumulativeA;
    this.state.priceBCumulative = cumulativeB;
    this.state.lastUpdate = timestamp;
    this.state.observations.push({ timestamp, priceACumulative: cumulativeA, priceBCumulative: cumulativeB });
    if (this.state.observations.length > this.state.observationCardinality) {
      this.state.observations.shift();
    }
    Debug(`AmmPool[${this.id}]: observation recorded at ${timestamp}`);
  }
}

/**
 * out = reserveOut * in * (BPS - fee) / (reserveIn * BPS + in * (BPS - fee))
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): bigint {
  if (reserveIn == 0n || reserveOut == 0n) {
    throw new InsufficientLiquidityError('pool has no liquidity');
  }
  const amountInWithFee = amountIn * (BPS - BigInt(feeBps));
  return mulDiv(amountInWithFee, reserveOut, reserveIn * BPS + amountInWithFee);
}

/**
 * Input needed for `amountOut`, rounded up
 */
export function getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): bigint {
  if (reserveIn == 0n || reserveOut == 0n) {
    throw new InsufficientLiquidityError('pool has no liquidity');
  }
  if (amountOut >= reserveOut) {
    throw new InsufficientLiquidityError(`requested ${amountOut} of a ${reserveOut} reserve`);
  }
  return mulDiv(reserveIn * amountOut, BPS, (reserveOut - amountOut) * (BPS - BigInt(feeBps)), Rounding.UP);
}
