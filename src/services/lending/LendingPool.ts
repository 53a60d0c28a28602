import BigNumber from 'bignumber.js';
import { Checkpointable } from '../../model/Checkpoint';
import { LendingPoolState } from '../../model/EngineState';
import { ExecutionContext } from '../../model/ExecutionContext';
import { GetPositionKey, Position, PositionView, SeizedCollateral } from '../../model/Position';
import { CollateralReserve, LiquidityReserve, ReserveConfig } from '../../model/ReserveConfig';
import { RequireCaller } from '../../utils/AccessControl';
import { BPS, DEFAULT_VIRTUAL_SHARES, RAY, WAD } from '../../utils/Constants';
import {
  ConfigurationError,
  DebtCeilingExceededError,
  HealthFactorTooLowError,
  InsufficientBalanceError,
  InsufficientCollateralError,
  InsufficientLiquidityError,
  InvalidAmountError,
  MinimumDebtViolationError,
  PositionHealthyError,
  PositionInLiquidationError,
  UnknownReserveError
} from '../../utils/Errors';
import { assertInvariant, checkedSub, minBigInt, mulDiv, Rounding, rpow } from '../../utils/FixedPointMath';
import { Log, Warn } from '../../utils/Logger';
import { ReentrancyGuard } from '../../utils/ReentrancyGuard';
import { norm, ToBaseValue, WadToBigNumber } from '../../utils/TokenUtils';
import { DeepCopy } from '../../utils/Utils';
import { TokenLedger } from '../ledger/TokenLedger';
import { PriceOracle } from '../oracle/PriceOracle';

export const LENDING_POOL_ACCOUNT = 'lending:pool';

/**
 * Prices and settles liquidations on behalf of the pool
 */
export interface LiquidationHandler {
  liquidate(ctx: ExecutionContext, owner: string, asset: string, debtToCover: bigint): SeizedCollateral;
}

interface PositionValues {
  collateralValue: bigint; // wad
  debtValue: bigint; // wad
}

/**
 * Collateralized debt positions against per-collateral reserves, funded by lenders of the debt asset.
 *
 * Debt is stored normalized by the collateral's cumulative rate: accruing interest is one index update
 * per collateral type, never a loop over positions.
 */
export class LendingPool implements Checkpointable<LendingPoolState> {
  private state: LendingPoolState = { reserves: {}, liquidity: {}, positions: {} };
  private liquidationHandler?: LiquidationHandler;
  private readonly guard = new ReentrancyGuard('lending pool');

  constructor(
    private readonly ledger: TokenLedger,
    private readonly oracle: PriceOracle,
    private readonly admins: string[]
  ) {}

  setLiquidationHandler(handler: LiquidationHandler) {
    this.liquidationHandler = handler;
  }

  ////////////////////////////// CONFIGURATION //////////////////////////////

  listDebtAsset(ctx: ExecutionContext, asset: string) {
    RequireCaller(ctx, this.admins, `list debt asset ${asset}`);
    if (this.state.liquidity[asset]) {
      throw new ConfigurationError(`debt asset ${asset} already listed`);
    }

    this.state.liquidity[asset] = {
      asset,
      decimals: this.ledger.decimalsOf(asset),
      cash: 0n,
      totalShares: 0n,
      shares: {},
      flashFeesCollected: 0n,
      badDebt: 0n
    };
    Log(`LendingPool: debt asset ${asset} listed`);
  }

  configureReserve(ctx: ExecutionContext, config: ReserveConfig) {
    RequireCaller(ctx, this.admins, `configure reserve ${config.asset}`);
    ValidateReserveConfig(config);
    if (!this.state.liquidity[config.debtAsset]) {
      throw new UnknownReserveError(config.debtAsset);
    }
    if (this.ledger.decimalsOf(config.asset) != config.decimals) {
      throw new ConfigurationError(`reserve ${config.asset}: decimals ${config.decimals} do not match the asset`);
    }

    const existing = this.state.reserves[config.asset];
    if (existing) {
      if (existing.config.debtAsset != config.debtAsset && existing.totalNormalizedDebt > 0n) {
        throw new ConfigurationError(`reserve ${config.asset}: cannot change debt asset with debt outstanding`);
      }
      // interest up to now is owed at the old rate
      this.accrueInterest(ctx, config.asset);
      existing.config = { ...config };
      Log(`LendingPool: reserve ${config.asset} reconfigured`);
      return;
    }

    this.state.reserves[config.asset] = {
      config: { ...config },
      index: { cumulativeRate: RAY, lastUpdate: ctx.timestamp },
      totalCollateral: 0n,
      totalNormalizedDebt: 0n
    };
    Log(
      `LendingPool: reserve ${config.asset} configured, ltv ${config.maxLtvBps} threshold ${config.liquidationThresholdBps} bonus ${config.liquidationBonusBps}`
    );
  }

  ////////////////////////////// LENDERS //////////////////////////////

  provideLiquidity(ctx: ExecutionContext, asset: string, amount: bigint): bigint {
    return this.guard.run(() => {
      if (amount <= 0n) {
        throw new InvalidAmountError(`liquidity amount must be positive, got ${amount}`);
      }
      const liquidity = this.getLiquidityReserve(asset);
      this.accrueDebtAsset(ctx, asset);

      const assetsBefore = this.liquidityAssets(ctx, asset, Rounding.UP);
      const received = this.ledger.transferAndMeasure(asset, ctx.callerId, LENDING_POOL_ACCOUNT, amount);
      const shares = mulDiv(received, liquidity.totalShares + DEFAULT_VIRTUAL_SHARES, assetsBefore + 1n);
      if (shares == 0n) {
        throw new InvalidAmountError(`liquidity of ${received} mints no shares`);
      }

      liquidity.cash += received;
      liquidity.totalShares += shares;
      liquidity.shares[ctx.callerId] = (liquidity.shares[ctx.callerId] ?? 0n) + shares;

      Log(`LendingPool: ${ctx.callerId} provided ${norm(received, liquidity.decimals)} ${asset} for ${shares} shares`);
      return shares;
    });
  }

  removeLiquidity(ctx: ExecutionContext, asset: string, shares: bigint): bigint {
    return this.guard.run(() => {
      if (shares <= 0n) {
        throw new InvalidAmountError(`shares must be positive, got ${shares}`);
      }
      const liquidity = this.getLiquidityReserve(asset);
      const held = liquidity.shares[ctx.callerId] ?? 0n;
      if (held < shares) {
        throw new InsufficientBalanceError(`${asset} liquidity shares`, ctx.callerId, shares, held);
      }
      this.accrueDebtAsset(ctx, asset);

      const assets = mulDiv(
        shares,
        this.liquidityAssets(ctx, asset, Rounding.DOWN) + 1n,
        liquidity.totalShares + DEFAULT_VIRTUAL_SHARES
      );
      if (assets > liquidity.cash) {
        throw new InsufficientLiquidityError(`${asset} reserve has ${liquidity.cash} cash, ${assets} requested`);
      }

      liquidity.shares[ctx.callerId] = held - shares;
      if (liquidity.shares[ctx.callerId] == 0n) {
        delete liquidity.shares[ctx.callerId];
      }
      liquidity.totalShares = checkedSub(liquidity.totalShares, shares, `${asset} liquidity shares`);
      liquidity.cash = checkedSub(liquidity.cash, assets, `${asset} cash`);
      this.ledger.transfer(asset, LENDING_POOL_ACCOUNT, ctx.callerId, assets);

      Log(`LendingPool: ${ctx.callerId} removed ${norm(assets, liquidity.decimals)} ${asset} for ${shares} shares`);
      return assets;
    });
  }

  /**
   * Cash plus debt outstanding against every collateral borrowing `asset`
   */
  liquidityAssets(ctx: ExecutionContext, asset: string, rounding = Rounding.DOWN): bigint {
    const liquidity = this.getLiquidityReserve(asset);
    let outstanding = 0n;
    for (const reserve of Object.values(this.state.reserves)) {
      if (reserve.config.debtAsset == asset) {
        outstanding += mulDiv(reserve.totalNormalizedDebt, this.currentRate(ctx, reserve.config.asset), RAY, rounding);
      }
    }
    return liquidity.cash + outstanding;
  }

  liquiditySharesOf(asset: string, provider: string): bigint {
    return this.getLiquidityReserve(asset).shares[provider] ?? 0n;
  }

  ////////////////////////////// INTEREST //////////////////////////////

  /**
   * index = index * ratePerSecond ^ elapsed. Idempotent within a timestamp.
   */
  accrueInterest(ctx: ExecutionContext, asset: string): bigint {
    const reserve = this.getReserve(asset);
    const index = reserve.index;
    if (ctx.timestamp <= index.lastUpdate) {
      return index.cumulativeRate;
    }

    const newRate = this.currentRate(ctx, asset);
    assertInvariant(newRate >= index.cumulativeRate, `interest index of ${asset} would decrease`);
    index.cumulativeRate = newRate;
    index.lastUpdate = ctx.timestamp;
    return newRate;
  }

  /**
   * Cumulative rate as of ctx, without writing it
   */
  currentRate(ctx: ExecutionContext, asset: string): bigint {
    const reserve = this.getReserve(asset);
    const { cumulativeRate, lastUpdate } = reserve.index;
    if (ctx.timestamp <= lastUpdate) {
      return cumulativeRate;
    }
    const growth = rpow(reserve.config.borrowRatePerSecond, ctx.timestamp - lastUpdate, RAY);
    return mulDiv(cumulativeRate, growth, RAY);
  }

  totalDebt(ctx: ExecutionContext, asset: string): bigint {
    const reserve = this.getReserve(asset);
    return mulDiv(reserve.totalNormalizedDebt, this.currentRate(ctx, asset), RAY, Rounding.UP);
  }

  ////////////////////////////// BORROWERS //////////////////////////////

  supply(ctx: ExecutionContext, asset: string, amount: bigint): PositionView {
    return this.modifyPosition(ctx, asset, amount, 0n);
  }

  withdraw(ctx: ExecutionContext, asset: string, amount: bigint): PositionView {
    return this.modifyPosition(ctx, asset, -amount, 0n);
  }

  borrow(ctx: ExecutionContext, asset: string, amount: bigint): PositionView {
    return this.modifyPosition(ctx, asset, 0n, amount);
  }

  /**
   * Repay up to `amount`; anything above the outstanding debt is not pulled
   */
  repay(ctx: ExecutionContext, asset: string, amount: bigint): PositionView {
    const position = this.getPosition(ctx, ctx.callerId, asset);
    const debt = position ? position.debt : 0n;
    const toRepay = minBigInt(amount, debt);
    if (toRepay <= 0n) {
      throw new InvalidAmountError(`nothing to repay on ${ctx.callerId}/${asset}`);
    }
    return this.modifyPosition(ctx, asset, 0n, -toRepay);
  }

  /**
   * Apply a collateral delta and a debt delta to the caller's position in one step.
   * Positive deltas deposit collateral / borrow; negative ones withdraw collateral / repay.
   */
  modifyPosition(ctx: ExecutionContext, asset: string, collateralDelta: bigint, debtDelta: bigint): PositionView {
    return this.guard.run(() => {
      if (collateralDelta == 0n && debtDelta == 0n) {
        throw new InvalidAmountError('position change without any delta');
      }

      const owner = ctx.callerId;
      const reserve = this.getReserve(asset);
      const { config } = reserve;
      const liquidity = this.getLiquidityReserve(config.debtAsset);
      const rate = this.accrueInterest(ctx, asset);
      const key = GetPositionKey(owner, asset);
      const position: Position = this.state.positions[key]
        ? { ...this.state.positions[key] }
        : { owner, asset, collateralAmount: 0n, normalizedDebt: 0n, inLiquidation: false };

      if (position.inLiquidation && (collateralDelta < 0n || debtDelta > 0n)) {
        throw new PositionInLiquidationError(owner, asset);
      }

      // inbound legs, credited with what actually arrived
      let collateralIn = 0n;
      if (collateralDelta > 0n) {
        collateralIn = this.ledger.transferAndMeasure(asset, owner, LENDING_POOL_ACCOUNT, collateralDelta);
        position.collateralAmount += collateralIn;
      }

      let repaid = 0n;
      if (debtDelta < 0n) {
        const debt = mulDiv(position.normalizedDebt, rate, RAY, Rounding.UP);
        if (-debtDelta > debt) {
          throw new InvalidAmountError(`repayment of ${-debtDelta} exceeds debt ${debt}`);
        }
        repaid = this.ledger.transferAndMeasure(config.debtAsset, owner, LENDING_POOL_ACCOUNT, -debtDelta);
        position.normalizedDebt =
          repaid >= debt ? 0n : position.normalizedDebt - minBigInt(position.normalizedDebt, mulDiv(repaid, RAY, rate));
      }

      // outbound legs, checked before anything leaves the pool
      const collateralOut = collateralDelta < 0n ? -collateralDelta : 0n;
      if (collateralOut > position.collateralAmount) {
        throw new InsufficientCollateralError(
          `cannot withdraw ${collateralOut} ${asset}, position holds ${position.collateralAmount}`
        );
      }
      position.collateralAmount -= collateralOut;

      const borrowed = debtDelta > 0n ? debtDelta : 0n;
      let totalNormalizedDebt = reserve.totalNormalizedDebt - (this.state.positions[key]?.normalizedDebt ?? 0n);
      if (borrowed > 0n) {
        position.normalizedDebt += normalizeBorrow(borrowed, rate);
        const reserveDebt = mulDiv(totalNormalizedDebt + position.normalizedDebt, rate, RAY, Rounding.UP);
        if (reserveDebt > config.debtCeiling) {
          throw new DebtCeilingExceededError(asset, reserveDebt, config.debtCeiling);
        }
        if (borrowed > liquidity.cash) {
          throw new InsufficientLiquidityError(`${config.debtAsset} reserve has ${liquidity.cash} cash, ${borrowed} requested`);
        }
      }
      totalNormalizedDebt += position.normalizedDebt;

      const debtAfter = mulDiv(position.normalizedDebt, rate, RAY, Rounding.UP);
      if (debtDelta != 0n && debtAfter > 0n && debtAfter < config.minDebt) {
        throw new MinimumDebtViolationError(asset, debtAfter, config.minDebt);
      }

      if ((borrowed > 0n || collateralOut > 0n) && debtAfter > 0n) {
        const values = this.valuePosition(ctx, config, position.collateralAmount, debtAfter);
        if (values.collateralValue * BigInt(config.liquidationThresholdBps) < values.debtValue * BPS) {
          throw new HealthFactorTooLowError(computeHealthFactorWad(values, config));
        }
        if (borrowed > 0n && values.collateralValue * BigInt(config.maxLtvBps) < values.debtValue * BPS) {
          throw new InsufficientCollateralError(
            `debt value ${values.debtValue} above ${config.maxLtvBps} bps of collateral value ${values.collateralValue}`
          );
        }
      }

      // commit
      reserve.totalCollateral = checkedSub(reserve.totalCollateral + collateralIn, collateralOut, `${asset} collateral`);
      reserve.totalNormalizedDebt = totalNormalizedDebt;
      liquidity.cash = checkedSub(liquidity.cash + repaid, borrowed, `${config.debtAsset} cash`);
      this.storePosition(position);

      if (collateralOut > 0n) {
        this.ledger.transfer(asset, LENDING_POOL_ACCOUNT, owner, collateralOut);
      }
      if (borrowed > 0n) {
        this.ledger.transfer(config.debtAsset, LENDING_POOL_ACCOUNT, owner, borrowed);
      }

      Log(
        `LendingPool: ${owner}/${asset} collateral ${norm(position.collateralAmount, config.decimals)}, debt ${norm(debtAfter, liquidity.decimals)} ${config.debtAsset}`
      );
      return { ...position, debt: debtAfter, debtAsset: config.debtAsset };
    });
  }

  getPosition(ctx: ExecutionContext, owner: string, asset: string): PositionView | undefined {
    const position = this.state.positions[GetPositionKey(owner, asset)];
    if (!position) {
      return undefined;
    }
    const reserve = this.getReserve(asset);
    return {
      ...position,
      debt: mulDiv(position.normalizedDebt, this.currentRate(ctx, asset), RAY, Rounding.UP),
      debtAsset: reserve.config.debtAsset
    };
  }

  getPositions(): Position[] {
    return Object.values(this.state.positions).map((_) => ({ ..._ }));
  }

  /**
   * Health factor in wad, undefined when the position has no debt
   */
  healthFactorWad(ctx: ExecutionContext, owner: string, asset: string): bigint | undefined {
    const position = this.getPosition(ctx, owner, asset);
    if (!position || position.debt == 0n) {
      return undefined;
    }
    const { config } = this.getReserve(asset);
    return computeHealthFactorWad(this.valuePosition(ctx, config, position.collateralAmount, position.debt), config);
  }

  /**
   * collateral value * liquidation threshold / debt value. Infinity without debt.
   */
  healthFactor(ctx: ExecutionContext, owner: string, asset: string): BigNumber {
    const hf = this.healthFactorWad(ctx, owner, asset);
    return hf == undefined ? new BigNumber(Infinity) : WadToBigNumber(hf);
  }

  ////////////////////////////// LIQUIDATION //////////////////////////////

  liquidate(ctx: ExecutionContext, owner: string, asset: string, debtToCover: bigint): SeizedCollateral {
    if (!this.liquidationHandler) {
      throw new ConfigurationError('no liquidation handler set on the lending pool');
    }
    const position = this.getPosition(ctx, owner, asset);
    if (!position) {
      throw new PositionHealthyError(owner, asset);
    }
    if (!position.inLiquidation) {
      const hf = this.healthFactorWad(ctx, owner, asset);
      if (hf == undefined || hf >= WAD) {
        throw new PositionHealthyError(owner, asset);
      }
    }

    return this.liquidationHandler.liquidate(ctx, owner, asset, debtToCover);
  }

  setInLiquidation(owner: string, asset: string, inLiquidation: boolean) {
    const key = GetPositionKey(owner, asset);
    const position = this.state.positions[key];
    if (!position) {
      throw new UnknownReserveError(`${owner}/${asset} position`);
    }
    this.storePosition({ ...position, inLiquidation });
  }

  /**
   * Apply an auction fill: `debtRepaid` already sits in the pool account, `collateral` goes to `recipient`.
   */
  settleLiquidation(
    ctx: ExecutionContext,
    owner: string,
    asset: string,
    collateral: bigint,
    debtRepaid: bigint,
    recipient: string
  ) {
    this.guard.run(() => {
      const reserve = this.getReserve(asset);
      const liquidity = this.getLiquidityReserve(reserve.config.debtAsset);
      const rate = this.accrueInterest(ctx, asset);
      const key = GetPositionKey(owner, asset);
      const stored = this.state.positions[key];
      if (!stored) {
        throw new UnknownReserveError(`${owner}/${asset} position`);
      }
      const position = { ...stored };
      if (collateral > position.collateralAmount) {
        throw new InsufficientCollateralError(`cannot seize ${collateral}, position holds ${position.collateralAmount}`);
      }

      const debt = mulDiv(position.normalizedDebt, rate, RAY, Rounding.UP);
      const normalizedRepaid =
        debtRepaid >= debt ? position.normalizedDebt : minBigInt(position.normalizedDebt, mulDiv(debtRepaid, RAY, rate));

      position.collateralAmount -= collateral;
      position.normalizedDebt -= normalizedRepaid;
      reserve.totalCollateral = checkedSub(reserve.totalCollateral, collateral, `${asset} collateral`);
      reserve.totalNormalizedDebt = checkedSub(reserve.totalNormalizedDebt, normalizedRepaid, `${asset} debt`);
      liquidity.cash += debtRepaid;
      this.storePosition(position);

      this.ledger.transfer(asset, LENDING_POOL_ACCOUNT, recipient, collateral);
    });
  }

  /**
   * Remove what is left of the position's debt, charging it to the lenders. Returns the amount written off.
   */
  writeOffBadDebt(ctx: ExecutionContext, owner: string, asset: string): bigint {
    const reserve = this.getReserve(asset);
    const liquidity = this.getLiquidityReserve(reserve.config.debtAsset);
    const rate = this.accrueInterest(ctx, asset);
    const key = GetPositionKey(owner, asset);
    const stored = this.state.positions[key];
    if (!stored || stored.normalizedDebt == 0n) {
      return 0n;
    }

    const badDebt = mulDiv(stored.normalizedDebt, rate, RAY, Rounding.UP);
    reserve.totalNormalizedDebt = checkedSub(reserve.totalNormalizedDebt, stored.normalizedDebt, `${asset} debt`);
    liquidity.badDebt += badDebt;
    this.storePosition({ ...stored, normalizedDebt: 0n });

    Warn(`LendingPool: wrote off ${norm(badDebt, liquidity.decimals)} ${reserve.config.debtAsset} of bad debt from ${owner}/${asset}`);
    return badDebt;
  }

  ////////////////////////////// FLASH LOANS //////////////////////////////

  flashLiquidity(asset: string): bigint {
    return this.getLiquidityReserve(asset).cash;
  }

  lendFlash(asset: string, amount: bigint, to: string) {
    this.guard.run(() => {
      const liquidity = this.getLiquidityReserve(asset);
      if (amount > liquidity.cash) {
        throw new InsufficientLiquidityError(`${asset} reserve has ${liquidity.cash} cash, flash loan of ${amount}`);
      }
      liquidity.cash -= amount;
      this.ledger.transfer(asset, LENDING_POOL_ACCOUNT, to, amount);
    });
  }

  /**
   * Pull a flash loan repayment back into the reserve. Everything above `principal` is fee income.
   */
  settleFlash(asset: string, from: string, amount: bigint, principal: bigint): bigint {
    return this.guard.run(() => {
      const liquidity = this.getLiquidityReserve(asset);
      const received = this.ledger.transferAndMeasure(asset, from, LENDING_POOL_ACCOUNT, amount);
      liquidity.cash += received;
      if (received > principal) {
        liquidity.flashFeesCollected += received - principal;
      }
      return received;
    });
  }

  ////////////////////////////// STATE //////////////////////////////

  getReserve(asset: string): CollateralReserve {
    const reserve = this.state.reserves[asset];
    if (!reserve) {
      throw new UnknownReserveError(asset);
    }
    return reserve;
  }

  getLiquidityReserve(asset: string): LiquidityReserve {
    const liquidity = this.state.liquidity[asset];
    if (!liquidity) {
      throw new UnknownReserveError(asset);
    }
    return liquidity;
  }

  getReserveConfig(asset: string): ReserveConfig {
    return { ...this.getReserve(asset).config };
  }

  snapshot(): LendingPoolState {
    return DeepCopy(this.state);
  }

  restore(state: LendingPoolState) {
    this.state = DeepCopy(state);
  }

  private accrueDebtAsset(ctx: ExecutionContext, debtAsset: string) {
    for (const reserve of Object.values(this.state.reserves)) {
      if (reserve.config.debtAsset == debtAsset) {
        this.accrueInterest(ctx, reserve.config.asset);
      }
    }
  }

  private valuePosition(ctx: ExecutionContext, config: ReserveConfig, collateral: bigint, debt: bigint): PositionValues {
    const collateralPrice = this.oracle.getPriceWithFallback(ctx, config.asset);
    const debtPrice = this.oracle.getPriceWithFallback(ctx, config.debtAsset);
    const debtDecimals = this.getLiquidityReserve(config.debtAsset).decimals;

    return {
      collateralValue: ToBaseValue(collateral, config.decimals, collateralPrice.price, collateralPrice.decimals),
      debtValue: ToBaseValue(debt, debtDecimals, debtPrice.price, debtPrice.decimals, Rounding.UP)
    };
  }

  private storePosition(position: Position) {
    const key = GetPositionKey(position.owner, position.asset);
    if (position.collateralAmount == 0n && position.normalizedDebt == 0n && !position.inLiquidation) {
      delete this.state.positions[key];
    } else {
      this.state.positions[key] = position;
    }
  }
}

function computeHealthFactorWad(values: PositionValues, config: ReserveConfig): bigint {
  return mulDiv(values.collateralValue * BigInt(config.liquidationThresholdBps), WAD, values.debtValue * BPS);
}

// smallest normalized debt that reads back as at least `amount` at `rate`
function normalizeBorrow(amount: bigint, rate: bigint): bigint {
  const normalized = mulDiv(amount, RAY, rate);
  return mulDiv(normalized, rate, RAY, Rounding.UP) >= amount ? normalized : normalized + 1n;
}

/**
 * LTV < threshold, and a liquidation at the threshold must leave enough collateral to pay the bonus.
 */
export function ValidateReserveConfig(config: ReserveConfig) {
  const { maxLtvBps, liquidationThresholdBps, liquidationBonusBps } = config;
  if (maxLtvBps <= 0 || liquidationThresholdBps <= maxLtvBps || liquidationThresholdBps > Number(BPS)) {
    throw new ConfigurationError(
      `reserve ${config.asset}: need 0 < ltv (${maxLtvBps}) < threshold (${liquidationThresholdBps}) <= ${BPS}`
    );
  }
  if (liquidationBonusBps < 0 || (BPS + BigInt(liquidationBonusBps)) * BigInt(liquidationThresholdBps) > BPS * BPS) {
    throw new ConfigurationError(
      `reserve ${config.asset}: bonus ${liquidationBonusBps} too large for threshold ${liquidationThresholdBps}`
    );
  }
  if (config.debtCeiling < 0n || config.minDebt < 0n) {
    throw new ConfigurationError(`reserve ${config.asset}: negative debt ceiling or minimum debt`);
  }
  if (config.borrowRatePerSecond < RAY) {
    throw new ConfigurationError(`reserve ${config.asset}: borrow rate below 1 ray would shrink debt`);
  }
}
