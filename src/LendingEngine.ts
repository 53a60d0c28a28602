import BigNumber from 'bignumber.js';
import { AssetConfig } from './model/Asset';
import { AmmPoolConfig, LiquidityResult, SwapResult } from './model/AmmPool';
import { AuctionConfig, LiquidationAuction, TakeParams, TakeResult } from './model/Auction';
import { EngineState } from './model/EngineState';
import { ExecutionContext } from './model/ExecutionContext';
import { FlashLoanConfig, FlashLoanReceipt } from './model/FlashLoan';
import { FeedConfig, PriceReading, RoundData } from './model/OracleFeed';
import { PositionView, SeizedCollateral } from './model/Position';
import { ReserveConfig } from './model/ReserveConfig';
import { TransactionResult } from './model/Transaction';
import { VaultConfig, VaultOperationResult } from './model/Vault';
import { StateCheckpointer } from './executor/StateCheckpointer';
import { TransactionExecutor } from './executor/TransactionExecutor';
import { AmmPool } from './services/amm/AmmPool';
import { AmmRegistry } from './services/amm/AmmRegistry';
import { FlashLoanCoordinator } from './services/flashloan/FlashLoanCoordinator';
import { LiquidationStrategy } from './services/flashloan/strategies/LiquidationStrategy';
import { LendingPool } from './services/lending/LendingPool';
import { TokenLedger } from './services/ledger/TokenLedger';
import { LiquidationEngine } from './services/liquidation/LiquidationEngine';
import { PriceOracle } from './services/oracle/PriceOracle';
import { ReportedPriceFeed } from './services/oracle/ReportedPriceFeed';
import { SequencerUptimeFeed } from './services/oracle/SequencerUptimeFeed';
import { TwapPriceSource } from './services/oracle/TwapPriceSource';
import { VaultSharePriceFeed } from './services/oracle/VaultSharePriceFeed';
import { VaultAccounting } from './services/vault/VaultAccounting';
import { VaultRegistry } from './services/vault/VaultRegistry';
import { RequireCaller } from './utils/AccessControl';
import { ConfigurationError } from './utils/Errors';
import { Log } from './utils/Logger';

export interface LendingEngineOptions {
  admins: string[];
  priceReporters: string[];
  auction: AuctionConfig;
  flashLoan: FlashLoanConfig;
  sequencerGracePeriod?: number; // execution liveness is only checked when set
}

/**
 * Host facing entry point. Every state changing call runs as one transaction through the executor:
 * it either applies completely or leaves no trace and returns the error.
 */
export class LendingEngine {
  readonly ledger: TokenLedger;
  readonly priceFeed: ReportedPriceFeed;
  readonly sequencer: SequencerUptimeFeed;
  readonly oracle: PriceOracle;
  readonly lendingPool: LendingPool;
  readonly liquidations: LiquidationEngine;
  readonly pools: AmmRegistry;
  readonly vaults: VaultRegistry;
  readonly flashLoans: FlashLoanCoordinator;
  readonly checkpointer: StateCheckpointer;
  readonly executor: TransactionExecutor;
  private readonly admins: string[];

  constructor(options: LendingEngineOptions) {
    if (options.admins.length == 0) {
      throw new ConfigurationError('at least one admin is required');
    }
    this.admins = [...options.admins];

    this.ledger = new TokenLedger();
    this.priceFeed = new ReportedPriceFeed(options.priceReporters);
    this.sequencer = new SequencerUptimeFeed(options.priceReporters);
    this.oracle = new PriceOracle(
      this.priceFeed,
      options.sequencerGracePeriod == undefined
        ? undefined
        : { feed: this.sequencer, gracePeriod: options.sequencerGracePeriod }
    );
    this.lendingPool = new LendingPool(this.ledger, this.oracle, this.admins);
    this.liquidations = new LiquidationEngine(this.ledger, this.lendingPool, this.oracle, options.auction);
    this.lendingPool.setLiquidationHandler(this.liquidations);
    this.pools = new AmmRegistry(this.ledger, this.admins);
    this.vaults = new VaultRegistry(this.ledger, this.admins);

    this.checkpointer = new StateCheckpointer();
    this.checkpointer.register('ledger', this.ledger);
    this.checkpointer.register('priceFeed', this.priceFeed);
    this.checkpointer.register('sequencer', this.sequencer);
    this.checkpointer.register('lendingPool', this.lendingPool);
    this.checkpointer.register('liquidation', this.liquidations);
    this.checkpointer.register('pools', this.pools);
    this.checkpointer.register('vaults', this.vaults);

    this.flashLoans = new FlashLoanCoordinator(this.ledger, this.lendingPool, this.checkpointer, options.flashLoan);
    this.checkpointer.register('flashLoans', this.flashLoans);
    this.flashLoans.registerStrategy(new LiquidationStrategy(this.ledger, this.liquidations, this.pools));

    this.executor = new TransactionExecutor(this.checkpointer);
  }

  /**
   * Run a composed operation as one transaction
   */
  execute<T>(ctx: ExecutionContext, label: string, operation: () => T): TransactionResult<T> {
    return this.executor.execute(ctx, label, operation);
  }

  ////////////////////////////// setup (admin) //////////////////////////////

  registerAsset(ctx: ExecutionContext, config: AssetConfig): TransactionResult<void> {
    return this.execute(ctx, 'registerAsset', () => {
      RequireCaller(ctx, this.admins, `register asset ${config.id}`);
      this.ledger.registerAsset(config);
    });
  }

  /**
   * Oracle configuration is static: it is not part of the transactional state.
   */
  configureFeed(ctx: ExecutionContext, config: FeedConfig) {
    RequireCaller(ctx, this.admins, `configure the ${config.asset} feed`);
    this.oracle.configureFeed(config);
  }

  setTwapSource(ctx: ExecutionContext, asset: string, poolId: string, window: number) {
    RequireCaller(ctx, this.admins, `set the ${asset} twap source`);
    if (window <= 0) {
      throw new ConfigurationError(`twap window must be positive, got ${window}`);
    }
    this.oracle.setSecondarySource(asset, new TwapPriceSource(this.ledger, this.pools, poolId, window));
  }

  /**
   * Price `shareAsset` from the vault's underlying feed and conservative share rate.
   * The share feed inherits the underlying feed's heartbeat and thresholds.
   */
  setVaultShareFeed(ctx: ExecutionContext, shareAsset: string, vaultId: string) {
    RequireCaller(ctx, this.admins, `set the ${shareAsset} vault share feed`);
    const vault = this.vaults.getVault(vaultId);
    if (vault.shareAsset != shareAsset) {
      throw new ConfigurationError(`vault ${vaultId} shares are ${vault.shareAsset}, not ${shareAsset}`);
    }
    const underlying = this.oracle.getFeedConfig(vault.asset);
    if (!underlying) {
      throw new ConfigurationError(`vault ${vaultId} underlying ${vault.asset} has no feed`);
    }

    const feed = new VaultSharePriceFeed(this.ledger, this.oracle.primaryFeedOf(vault.asset), this.vaults, vaultId);
    this.oracle.setPrimaryFeed(shareAsset, feed);
    this.oracle.configureFeed({ ...underlying, asset: shareAsset });
    Log(`LendingEngine: ${shareAsset} priced by ${feed.version} on vault ${vaultId}`);
  }

  reportPrice(ctx: ExecutionContext, asset: string, answer: bigint, updatedAt?: number): TransactionResult<RoundData> {
    return this.execute(ctx, 'reportPrice', () => this.priceFeed.reportPrice(ctx, asset, answer, updatedAt));
  }

  reportRound(ctx: ExecutionContext, asset: string, round: RoundData): TransactionResult<void> {
    return this.execute(ctx, 'reportRound', () => this.priceFeed.reportRound(ctx, asset, round));
  }

  reportSequencerStatus(ctx: ExecutionContext, live: boolean): TransactionResult<void> {
    return this.execute(ctx, 'reportSequencerStatus', () => this.sequencer.reportStatus(ctx, live));
  }

  ////////////////////////////// lending //////////////////////////////

  listDebtAsset(ctx: ExecutionContext, asset: string): TransactionResult<void> {
    return this.execute(ctx, 'listDebtAsset', () => this.lendingPool.listDebtAsset(ctx, asset));
  }

  configureReserve(ctx: ExecutionContext, config: ReserveConfig): TransactionResult<void> {
    return this.execute(ctx, 'configureReserve', () => this.lendingPool.configureReserve(ctx, config));
  }

  provideLiquidity(ctx: ExecutionContext, asset: string, amount: bigint): TransactionResult<bigint> {
    return this.execute(ctx, 'provideLiquidity', () => this.lendingPool.provideLiquidity(ctx, asset, amount));
  }

  removeLiquidity(ctx: ExecutionContext, asset: string, shares: bigint): TransactionResult<bigint> {
    return this.execute(ctx, 'removeLiquidity', () => this.lendingPool.removeLiquidity(ctx, asset, shares));
  }

  supply(ctx: ExecutionContext, asset: string, amount: bigint): TransactionResult<PositionView> {
    return this.execute(ctx, 'supply', () => this.lendingPool.supply(ctx, asset, amount));
  }

  withdraw(ctx: ExecutionContext, asset: string, amount: bigint): TransactionResult<PositionView> {
    return this.execute(ctx, 'withdraw', () => this.lendingPool.withdraw(ctx, asset, amount));
  }

  borrow(ctx: ExecutionContext, asset: string, amount: bigint): TransactionResult<PositionView> {
    return this.execute(ctx, 'borrow', () => this.lendingPool.borrow(ctx, asset, amount));
  }

  repay(ctx: ExecutionContext, asset: string, amount: bigint): TransactionResult<PositionView> {
    return this.execute(ctx, 'repay', () => this.lendingPool.repay(ctx, asset, amount));
  }

  modifyPosition(
    ctx: ExecutionContext,
    asset: string,
    collateralDelta: bigint,
    debtDelta: bigint
  ): TransactionResult<PositionView> {
    return this.execute(ctx, 'modifyPosition', () =>
      this.lendingPool.modifyPosition(ctx, asset, collateralDelta, debtDelta)
    );
  }

  accrueInterest(ctx: ExecutionContext, asset: string): TransactionResult<bigint> {
    return this.execute(ctx, 'accrueInterest', () => this.lendingPool.accrueInterest(ctx, asset));
  }

  getPosition(ctx: ExecutionContext, owner: string, asset: string): PositionView | undefined {
    return this.lendingPool.getPosition(ctx, owner, asset);
  }

  healthFactor(ctx: ExecutionContext, owner: string, asset: string): BigNumber {
    return this.lendingPool.healthFactor(ctx, owner, asset);
  }

  getPrice(ctx: ExecutionContext, asset: string): PriceReading {
    return this.oracle.getPrice(ctx, asset);
  }

  getPriceWithFallback(ctx: ExecutionContext, asset: string): PriceReading {
    return this.oracle.getPriceWithFallback(ctx, asset);
  }

  ////////////////////////////// liquidation //////////////////////////////

  liquidate(ctx: ExecutionContext, owner: string, asset: string, debtToCover: bigint): TransactionResult<SeizedCollateral> {
    return this.execute(ctx, 'liquidate', () => this.lendingPool.liquidate(ctx, owner, asset, debtToCover));
  }

  startAuction(ctx: ExecutionContext, owner: string, asset: string): TransactionResult<LiquidationAuction> {
    return this.execute(ctx, 'startAuction', () => this.liquidations.startAuction(ctx, owner, asset));
  }

  take(ctx: ExecutionContext, owner: string, asset: string, params: TakeParams): TransactionResult<TakeResult> {
    return this.execute(ctx, 'take', () => this.liquidations.take(ctx, owner, asset, params));
  }

  resetAuction(ctx: ExecutionContext, owner: string, asset: string): TransactionResult<LiquidationAuction> {
    return this.execute(ctx, 'resetAuction', () => this.liquidations.resetAuction(ctx, owner, asset));
  }

  getAuction(ctx: ExecutionContext, owner: string, asset: string): LiquidationAuction | undefined {
    return this.liquidations.getAuction(ctx, owner, asset);
  }

  ////////////////////////////// amm //////////////////////////////

  createPool(ctx: ExecutionContext, config: AmmPoolConfig): TransactionResult<string> {
    return this.execute(ctx, 'createPool', () => this.pools.createPool(ctx, config).id);
  }

  getPool(poolId: string): AmmPool {
    return this.pools.getPool(poolId);
  }

  addLiquidity(
    ctx: ExecutionContext,
    poolId: string,
    amountA: bigint,
    amountB: bigint,
    minShares = 0n
  ): TransactionResult<LiquidityResult> {
    return this.execute(ctx, 'addLiquidity', () =>
      this.pools.getPool(poolId).addLiquidity(ctx, amountA, amountB, minShares)
    );
  }

  removePoolLiquidity(
    ctx: ExecutionContext,
    poolId: string,
    shares: bigint,
    minAmountA = 0n,
    minAmountB = 0n
  ): TransactionResult<LiquidityResult> {
    return this.execute(ctx, 'removePoolLiquidity', () =>
      this.pools.getPool(poolId).removeLiquidity(ctx, shares, minAmountA, minAmountB)
    );
  }

  swapExactIn(
    ctx: ExecutionContext,
    poolId: string,
    assetIn: string,
    amountIn: bigint,
    minAmountOut: bigint,
    recipient?: string
  ): TransactionResult<SwapResult> {
    return this.execute(ctx, 'swapExactIn', () =>
      this.pools.getPool(poolId).swapExactIn(ctx, assetIn, amountIn, minAmountOut, recipient)
    );
  }

  swapExactOut(
    ctx: ExecutionContext,
    poolId: string,
    assetIn: string,
    amountOut: bigint,
    maxAmountIn: bigint,
    recipient?: string
  ): TransactionResult<SwapResult> {
    return this.execute(ctx, 'swapExactOut', () =>
      this.pools.getPool(poolId).swapExactOut(ctx, assetIn, amountOut, maxAmountIn, recipient)
    );
  }

  ////////////////////////////// vaults //////////////////////////////

  createVault(ctx: ExecutionContext, config: VaultConfig): TransactionResult<string> {
    return this.execute(ctx, 'createVault', () => this.vaults.createVault(ctx, config).id);
  }

  getVault(vaultId: string): VaultAccounting {
    return this.vaults.getVault(vaultId);
  }

  vaultDeposit(
    ctx: ExecutionContext,
    vaultId: string,
    assets: bigint,
    receiver?: string
  ): TransactionResult<VaultOperationResult> {
    return this.execute(ctx, 'vaultDeposit', () => this.vaults.getVault(vaultId).deposit(ctx, assets, receiver));
  }

  vaultMint(
    ctx: ExecutionContext,
    vaultId: string,
    shares: bigint,
    receiver?: string
  ): TransactionResult<VaultOperationResult> {
    return this.execute(ctx, 'vaultMint', () => this.vaults.getVault(vaultId).mint(ctx, shares, receiver));
  }

  vaultWithdraw(
    ctx: ExecutionContext,
    vaultId: string,
    assets: bigint,
    receiver?: string
  ): TransactionResult<VaultOperationResult> {
    return this.execute(ctx, 'vaultWithdraw', () => this.vaults.getVault(vaultId).withdraw(ctx, assets, receiver));
  }

  vaultRedeem(
    ctx: ExecutionContext,
    vaultId: string,
    shares: bigint,
    receiver?: string
  ): TransactionResult<VaultOperationResult> {
    return this.execute(ctx, 'vaultRedeem', () => this.vaults.getVault(vaultId).redeem(ctx, shares, receiver));
  }

  reportVaultYield(ctx: ExecutionContext, vaultId: string, amount: bigint): TransactionResult<bigint> {
    return this.execute(ctx, 'reportVaultYield', () => this.vaults.getVault(vaultId).reportYield(ctx, amount));
  }

  reportVaultLoss(ctx: ExecutionContext, vaultId: string, amount: bigint): TransactionResult<void> {
    return this.execute(ctx, 'reportVaultLoss', () => this.vaults.getVault(vaultId).reportLoss(ctx, amount));
  }

  skimVault(ctx: ExecutionContext, vaultId: string, to: string): TransactionResult<bigint> {
    return this.execute(ctx, 'skimVault', () => this.vaults.getVault(vaultId).skim(ctx, to));
  }

  convertToShares(vaultId: string, assets: bigint): bigint {
    return this.vaults.getVault(vaultId).convertToShares(assets);
  }

  convertToAssets(vaultId: string, shares: bigint): bigint {
    return this.vaults.getVault(vaultId).convertToAssets(shares);
  }

  ////////////////////////////// flash loans //////////////////////////////

  flashLoan(
    ctx: ExecutionContext,
    asset: string,
    amount: bigint,
    strategyId: string,
    params: unknown
  ): TransactionResult<FlashLoanReceipt> {
    return this.execute(ctx, 'flashLoan', () => this.flashLoans.execute(ctx, asset, amount, strategyId, params));
  }

  ////////////////////////////// state //////////////////////////////

  /**
   * Serialized state of every transactional component
   */
  fingerprint(): string {
    return this.checkpointer.fingerprint();
  }

  exportState(): EngineState {
    return {
      executor: this.executor.snapshot(),
      ledger: this.ledger.snapshot(),
      priceFeed: this.priceFeed.snapshot(),
      sequencer: this.sequencer.snapshot(),
      lendingPool: this.lendingPool.snapshot(),
      liquidation: this.liquidations.snapshot(),
      pools: this.pools.snapshot(),
      vaults: this.vaults.snapshot(),
      flashLoans: this.flashLoans.snapshot()
    };
  }

  importState(state: EngineState) {
    if (this.executor.isRunning) {
      throw new ConfigurationError('cannot import state while a transaction is running');
    }
    this.executor.restore(state.executor);
    this.ledger.restore(state.ledger);
    this.priceFeed.restore(state.priceFeed);
    this.sequencer.restore(state.sequencer);
    this.lendingPool.restore(state.lendingPool);
    this.liquidations.restore(state.liquidation);
    this.pools.restore(state.pools);
    this.vaults.restore(state.vaults);
    this.flashLoans.restore(state.flashLoans);
  }
}
