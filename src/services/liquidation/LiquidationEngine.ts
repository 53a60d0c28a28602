import {
  AuctionConfig,
  AuctionStatus,
  LiquidationAuction,
  LiquidationEngineState,
  TakeParams,
  TakeResult
} from '../../model/Auction';
import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { GetPositionKey, PositionView, SeizedCollateral } from '../../model/Position';
import { BPS, WAD } from '../../utils/Constants';
import {
  AuctionAlreadyActiveError,
  AuctionExpiredError,
  AuctionNotExpiredError,
  AuctionNotStartedError,
  ConfigurationError,
  InvalidAmountError,
  MinimumDebtViolationError,
  PositionHealthyError,
  RepaymentInsufficientError,
  SlippageExceededError
} from '../../utils/Errors';
import { minBigInt, mulDiv, Rounding } from '../../utils/FixedPointMath';
import { Log, Warn } from '../../utils/Logger';
import { ReentrancyGuard } from '../../utils/ReentrancyGuard';
import { norm } from '../../utils/TokenUtils';
import { DeepCopy } from '../../utils/Utils';
import { TokenLedger } from '../ledger/TokenLedger';
import { LENDING_POOL_ACCOUNT, LendingPool, LiquidationHandler } from '../lending/LendingPool';
import { PriceOracle } from '../oracle/PriceOracle';
import { CreateDecayFunction, DecayFunction } from './PriceDecay';

/**
 * Dutch auctions of unhealthy positions' collateral.
 *
 * NOT_STARTED -> ACTIVE -> SETTLED
 *                  |  ^
 *                  v  | resetAuction
 *                EXPIRED
 *
 * Expiry is evaluated on read: an auction past `maxDuration` or below `floorFractionBps` of its start
 * price reports EXPIRED and refuses takes until it is reset.
 */
export class LiquidationEngine implements LiquidationHandler, Checkpointable<LiquidationEngineState> {
  private state: LiquidationEngineState = { nextAuctionId: 1, auctions: {} };
  private readonly decay: DecayFunction;
  private readonly guard = new ReentrancyGuard('liquidation engine');

  constructor(
    private readonly ledger: TokenLedger,
    private readonly pool: LendingPool,
    private readonly oracle: PriceOracle,
    private readonly config: AuctionConfig
  ) {
    if (config.bufferMultiplierBps <= 0 || config.maxDuration <= 0) {
      throw new ConfigurationError('auction buffer and max duration must be positive');
    }
    if (config.floorFractionBps < 0 || config.floorFractionBps >= Number(BPS)) {
      throw new ConfigurationError(`auction floor fraction ${config.floorFractionBps} out of range`);
    }
    this.decay = CreateDecayFunction(config.decay);
  }

  /**
   * The position's latest auction, with its status as of ctx
   */
  getAuction(ctx: ExecutionContext, owner: string, asset: string): LiquidationAuction | undefined {
    const auction = this.state.auctions[GetPositionKey(owner, asset)];
    if (!auction) {
      return undefined;
    }
    const copy = DeepCopy(auction);
    if (copy.status == AuctionStatus.ACTIVE && this.isExpired(ctx, copy)) {
      copy.status = AuctionStatus.EXPIRED;
    }
    return copy;
  }

  getAuctionStatus(ctx: ExecutionContext, owner: string, asset: string): AuctionStatus {
    return this.getAuction(ctx, owner, asset)?.status ?? AuctionStatus.NOT_STARTED;
  }

  /**
   * Current price of a running auction (wad, whole debt units per whole collateral unit)
   */
  getAuctionPrice(ctx: ExecutionContext, owner: string, asset: string): bigint {
    return this.currentPrice(ctx, this.requireRunning(owner, asset));
  }

  startAuction(ctx: ExecutionContext, owner: string, asset: string): LiquidationAuction {
    return this.guard.run(() => {
      const key = GetPositionKey(owner, asset);
      const existing = this.state.auctions[key];
      if (existing && existing.status != AuctionStatus.SETTLED) {
        throw new AuctionAlreadyActiveError(key);
      }

      this.pool.accrueInterest(ctx, asset);
      const position = this.pool.getPosition(ctx, owner, asset);
      const hf = this.pool.healthFactorWad(ctx, owner, asset);
      if (!position || hf == undefined || hf >= WAD) {
        throw new PositionHealthyError(owner, asset);
      }

      const auction: LiquidationAuction = {
        id: this.state.nextAuctionId++,
        positionKey: key,
        owner,
        collateralAsset: asset,
        debtAsset: position.debtAsset,
        status: AuctionStatus.ACTIVE,
        startPrice: this.computeStartPrice(ctx, asset, position.debtAsset),
        startTime: ctx.timestamp,
        decay: DeepCopy(this.config.decay),
        maxDuration: this.config.maxDuration,
        floorFractionBps: this.config.floorFractionBps,
        initialCollateral: position.collateralAmount,
        initialDebt: position.debt,
        remainingCollateral: position.collateralAmount,
        remainingDebt: position.debt,
        collateralSold: 0n,
        debtRecovered: 0n,
        badDebt: 0n,
        resets: 0
      };
      this.state.auctions[key] = auction;
      this.pool.setInLiquidation(owner, asset, true);

      Log(
        `LiquidationEngine: auction ${auction.id} started for ${key}, ${this.fmtCollateral(auction, auction.remainingCollateral)} ${asset} against ${this.fmtDebt(auction, auction.remainingDebt)} ${auction.debtAsset}, start price ${norm(auction.startPrice)}`
      );

      if (position.collateralAmount == 0n) {
        this.finishWithBadDebt(ctx, auction);
      }
      return DeepCopy(auction);
    });
  }

  /**
   * Buy up to `maxCollateral` at the current auction price, paid by the caller in the debt asset.
   */
  take(ctx: ExecutionContext, owner: string, asset: string, params: TakeParams): TakeResult {
    return this.guard.run(() => {
      const auction = this.requireRunning(owner, asset);
      if (this.isExpired(ctx, auction)) {
        throw new AuctionExpiredError(auction.positionKey);
      }
      if (params.maxCollateral <= 0n) {
        throw new InvalidAmountError(`take needs a positive collateral amount, got ${params.maxCollateral}`);
      }

      const price = this.currentPrice(ctx, auction);
      if (price > params.maxPrice) {
        throw new SlippageExceededError(`auction price ${price} above maximum ${params.maxPrice}`);
      }

      this.pool.accrueInterest(ctx, asset);
      const position = this.requirePosition(ctx, owner, asset);
      // priced against the live position, not the amounts seen at start
      auction.remainingCollateral = position.collateralAmount;
      const tab = position.debt;
      if (tab == 0n) {
        auction.remainingDebt = 0n;
        this.finish(auction);
        return { auctionId: auction.id, collateralSeized: 0n, debtRepaid: 0n, price, status: auction.status };
      }
      const { minDebt } = this.pool.getReserveConfig(asset);

      let slice = minBigInt(params.maxCollateral, auction.remainingCollateral);
      let owe = this.debtForCollateral(auction, slice, price);
      if (owe > tab) {
        owe = tab;
        slice = minBigInt(this.collateralForDebt(auction, owe, price), auction.remainingCollateral);
      } else if (owe < tab && slice < auction.remainingCollateral && tab - owe < minDebt) {
        // partial fill would leave dust behind
        if (tab <= minDebt) {
          throw new MinimumDebtViolationError(asset, tab - owe, minDebt);
        }
        owe = tab - minDebt;
        slice = this.collateralForDebt(auction, owe, price);
      }
      if (slice == 0n || owe == 0n) {
        throw new InvalidAmountError(`take of ${params.maxCollateral} ${asset} at ${price} buys nothing`);
      }

      const payer = ctx.callerId;
      const received = this.ledger.transferAndMeasure(auction.debtAsset, payer, LENDING_POOL_ACCOUNT, owe);
      if (received < owe) {
        throw new RepaymentInsufficientError(auction.debtAsset, received, owe);
      }
      this.pool.settleLiquidation(ctx, owner, asset, slice, received, params.recipient ?? payer);

      const after = this.pool.getPosition(ctx, owner, asset);
      auction.remainingCollateral = after?.collateralAmount ?? 0n;
      auction.remainingDebt = after?.debt ?? 0n;
      auction.collateralSold += slice;
      auction.debtRecovered += owe;

      Log(
        `LiquidationEngine: auction ${auction.id} ${payer} bought ${this.fmtCollateral(auction, slice)} ${asset} for ${this.fmtDebt(auction, owe)} ${auction.debtAsset} at ${norm(price)}`
      );

      if (auction.remainingDebt == 0n) {
        this.finish(auction);
      } else if (auction.remainingCollateral == 0n) {
        this.finishWithBadDebt(ctx, auction);
      }

      return {
        auctionId: auction.id,
        collateralSeized: slice,
        debtRepaid: owe,
        price,
        status: auction.status
      };
    });
  }

  /**
   * Restart an expired auction from the current oracle price
   */
  resetAuction(ctx: ExecutionContext, owner: string, asset: string): LiquidationAuction {
    return this.guard.run(() => {
      const auction = this.requireRunning(owner, asset);
      if (!this.isExpired(ctx, auction)) {
        throw new AuctionNotExpiredError(auction.positionKey);
      }

      auction.startPrice = this.computeStartPrice(ctx, asset, auction.debtAsset);
      auction.startTime = ctx.timestamp;
      auction.status = AuctionStatus.ACTIVE;
      auction.resets++;

      Log(`LiquidationEngine: auction ${auction.id} reset (#${auction.resets}), start price ${norm(auction.startPrice)}`);
      return DeepCopy(auction);
    });
  }

  /**
   * Start the auction when needed, then buy the collateral worth `debtToCover` at the current price.
   */
  liquidate(ctx: ExecutionContext, owner: string, asset: string, debtToCover: bigint): SeizedCollateral {
    if (debtToCover <= 0n) {
      throw new InvalidAmountError(`debt to cover must be positive, got ${debtToCover}`);
    }
    const status = this.getAuctionStatus(ctx, owner, asset);
    if (status == AuctionStatus.EXPIRED) {
      throw new AuctionExpiredError(GetPositionKey(owner, asset));
    }
    if (status != AuctionStatus.ACTIVE) {
      const started = this.startAuction(ctx, owner, asset);
      if (started.status == AuctionStatus.SETTLED) {
        return { auctionId: started.id, collateralSeized: 0n, debtRepaid: 0n, price: started.startPrice };
      }
    }

    const auction = this.requireRunning(owner, asset);
    const price = this.currentPrice(ctx, auction);
    const maxCollateral = this.collateralForDebt(auction, debtToCover, price);
    const result = this.take(ctx, owner, asset, { maxCollateral, maxPrice: price });
    return {
      auctionId: result.auctionId,
      collateralSeized: result.collateralSeized,
      debtRepaid: result.debtRepaid,
      price: result.price
    };
  }

  snapshot(): LiquidationEngineState {
    return DeepCopy(this.state);
  }

  restore(state: LiquidationEngineState) {
    this.state = DeepCopy(state);
  }

  ////////////////////////////// internals //////////////////////////////

  /**
   * collateral oracle price / debt oracle price * buffer, in wad
   */
  private computeStartPrice(ctx: ExecutionContext, collateralAsset: string, debtAsset: string): bigint {
    const collateral = this.oracle.getPriceWithFallback(ctx, collateralAsset);
    const debt = this.oracle.getPriceWithFallback(ctx, debtAsset);
    return mulDiv(
      collateral.price * 10n ** BigInt(debt.decimals) * BigInt(this.config.bufferMultiplierBps),
      WAD,
      debt.price * 10n ** BigInt(collateral.decimals) * BPS
    );
  }

  private currentPrice(ctx: ExecutionContext, auction: LiquidationAuction): bigint {
    return this.decay(auction.startPrice, ctx.timestamp - auction.startTime);
  }

  private isExpired(ctx: ExecutionContext, auction: LiquidationAuction): boolean {
    if (auction.status == AuctionStatus.EXPIRED) {
      return true;
    }
    const elapsed = ctx.timestamp - auction.startTime;
    const price = this.currentPrice(ctx, auction);
    return (
      elapsed > auction.maxDuration ||
      price == 0n ||
      price * BPS < auction.startPrice * BigInt(auction.floorFractionBps)
    );
  }

  // debt owed for `collateral` at `price`, the bonus discounting the collateral
  private debtForCollateral(auction: LiquidationAuction, collateral: bigint, price: bigint): bigint {
    const { collateralDecimals, debtDecimals, bonusBps } = this.auctionUnits(auction);
    return mulDiv(
      collateral * price * 10n ** debtDecimals,
      BPS,
      10n ** collateralDecimals * WAD * (BPS + bonusBps),
      Rounding.UP
    );
  }

  private collateralForDebt(auction: LiquidationAuction, debt: bigint, price: bigint): bigint {
    const { collateralDecimals, debtDecimals, bonusBps } = this.auctionUnits(auction);
    return mulDiv(debt * 10n ** collateralDecimals * WAD, BPS + bonusBps, price * 10n ** debtDecimals * BPS);
  }

  private auctionUnits(auction: LiquidationAuction) {
    const config = this.pool.getReserveConfig(auction.collateralAsset);
    return {
      collateralDecimals: BigInt(config.decimals),
      debtDecimals: BigInt(this.ledger.decimalsOf(auction.debtAsset)),
      bonusBps: BigInt(config.liquidationBonusBps)
    };
  }

  private requireRunning(owner: string, asset: string): LiquidationAuction {
    const key = GetPositionKey(owner, asset);
    const auction = this.state.auctions[key];
    if (!auction || auction.status == AuctionStatus.SETTLED) {
      throw new AuctionNotStartedError(key);
    }
    return auction;
  }

  private requirePosition(ctx: ExecutionContext, owner: string, asset: string): PositionView {
    const position = this.pool.getPosition(ctx, owner, asset);
    if (!position) {
      throw new AuctionNotStartedError(GetPositionKey(owner, asset));
    }
    return position;
  }

  private finish(auction: LiquidationAuction) {
    auction.status = AuctionStatus.SETTLED;
    this.pool.setInLiquidation(auction.owner, auction.collateralAsset, false);
    Log(
      `LiquidationEngine: auction ${auction.id} settled, recovered ${this.fmtDebt(auction, auction.debtRecovered)} ${auction.debtAsset}`
    );
  }

  private finishWithBadDebt(ctx: ExecutionContext, auction: LiquidationAuction) {
    auction.badDebt = this.pool.writeOffBadDebt(ctx, auction.owner, auction.collateralAsset);
    auction.remainingDebt = 0n;
    Warn(
      `LiquidationEngine: auction ${auction.id} ran out of collateral, ${this.fmtDebt(auction, auction.badDebt)} ${auction.debtAsset} of bad debt`
    );
    this.finish(auction);
  }

  private fmtCollateral(auction: LiquidationAuction, amount: bigint) {
    return norm(amount, this.ledger.decimalsOf(auction.collateralAsset));
  }

  private fmtDebt(auction: LiquidationAuction, amount: bigint) {
    return norm(amount, this.ledger.decimalsOf(auction.debtAsset));
  }
}
