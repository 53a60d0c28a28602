import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { VaultLedgerState, VaultOperationResult } from '../../model/Vault';
import { RequireCaller } from '../../utils/AccessControl';
import { BPS, WAD } from '../../utils/Constants';
import {
  InflationGuardTriggeredError,
  InsufficientBalanceError,
  InvalidAmountError,
  SlippageExceededError
} from '../../utils/Errors';
import { assertInvariant, checkedSub, minBigInt, mulDiv, Rounding } from '../../utils/FixedPointMath';
import { Log, Warn } from '../../utils/Logger';
import { ReentrancyGuard } from '../../utils/ReentrancyGuard';
import { norm } from '../../utils/TokenUtils';
import { DeepCopy } from '../../utils/Utils';
import { TokenLedger } from '../ledger/TokenLedger';

export function GetVaultAccount(vaultId: string) {
  return `vault:${vaultId}`;
}

/**
 * Tokenized vault share accounting.
 *
 * `totalAssets` is an internal ledger: it only moves through the vault's own operations, so tokens
 * transferred to the vault account directly do not change the share price. Conversions add
 * `virtualShares` to the supply and one virtual asset to the assets:
 *
 *   shares = assets * (totalShares + V) / (totalAssets + 1)
 *   assets = shares * (totalAssets + 1) / (totalShares + V)
 *
 * deposit and redeem round down, mint and withdraw round up.
 */
export class VaultAccounting implements Checkpointable<VaultLedgerState> {
  private state: VaultLedgerState;
  private readonly guard: ReentrancyGuard;

  constructor(
    private readonly ledger: TokenLedger,
    state: VaultLedgerState
  ) {
    this.state = DeepCopy(state);
    this.guard = new ReentrancyGuard(`vault ${state.id}`);
  }

  get id() {
    return this.state.id;
  }

  get asset() {
    return this.state.asset;
  }

  get shareAsset() {
    return this.state.shareAsset;
  }

  get account() {
    return GetVaultAccount(this.state.id);
  }

  get totalAssets() {
    return this.state.totalAssets;
  }

  get totalShares() {
    return this.state.totalShares;
  }

  /**
   * Custody balance not recorded in totalAssets (donations, stray transfers)
   */
  unaccountedAssets(): bigint {
    const custody = this.ledger.balanceOf(this.state.asset, this.account);
    return custody > this.state.totalAssets ? custody - this.state.totalAssets : 0n;
  }

  convertToShares(assets: bigint, rounding = Rounding.DOWN): bigint {
    return mulDiv(assets, this.state.totalShares + this.state.virtualShares, this.state.totalAssets + 1n, rounding);
  }

  convertToAssets(shares: bigint, rounding = Rounding.DOWN): bigint {
    return mulDiv(shares, this.state.totalAssets + 1n, this.state.totalShares + this.state.virtualShares, rounding);
  }

  previewDeposit(assets: bigint) {
    return this.convertToShares(assets, Rounding.DOWN);
  }

  previewMint(shares: bigint) {
    return this.convertToAssets(shares, Rounding.UP);
  }

  previewWithdraw(assets: bigint) {
    return this.convertToShares(assets, Rounding.UP);
  }

  previewRedeem(shares: bigint) {
    return this.convertToAssets(shares, Rounding.DOWN);
  }

  maxRedeem(owner: string): bigint {
    return this.ledger.balanceOf(this.state.shareAsset, owner);
  }

  maxWithdraw(owner: string): bigint {
    return this.convertToAssets(this.maxRedeem(owner), Rounding.DOWN);
  }

  /**
   * Assets per raw share unit, wad
   */
  spotRate(): bigint {
    return mulDiv(this.state.totalAssets + 1n, WAD, this.state.totalShares + this.state.virtualShares);
  }

  /**
   * Share rate safe to price collateral with: never above the rate recorded before the first
   * mutation of the current timestamp.
   */
  conservativeRate(ctx: ExecutionContext): bigint {
    const spot = this.spotRate();
    if (this.state.checkpoint.timestamp == ctx.timestamp) {
      return minBigInt(spot, this.state.checkpoint.rate);
    }
    return spot;
  }

  deposit(ctx: ExecutionContext, assets: bigint, receiver = ctx.callerId): VaultOperationResult {
    return this.guard.run(() => {
      requirePositive(assets, 'deposit');
      this.touchCheckpoint(ctx);
      this.checkInflationGuard();

      const received = this.ledger.transferAndMeasure(this.state.asset, ctx.callerId, this.account, assets);
      const shares = this.convertToShares(received, Rounding.DOWN);
      if (shares == 0n) {
        throw new InvalidAmountError(`deposit of ${received} mints no shares`);
      }

      this.state.totalAssets += received;
      this.mintShares(receiver, shares);
      this.logOperation('deposit', ctx.callerId, received, shares);
      return { assets: received, shares };
    });
  }

  mint(ctx: ExecutionContext, shares: bigint, receiver = ctx.callerId): VaultOperationResult {
    return this.guard.run(() => {
      requirePositive(shares, 'mint');
      this.touchCheckpoint(ctx);
      this.checkInflationGuard();

      const assets = this.convertToAssets(shares, Rounding.UP);
      const received = this.ledger.transferAndMeasure(this.state.asset, ctx.callerId, this.account, assets);
      if (received < assets) {
        throw new SlippageExceededError(`vault ${this.id} received ${received} of ${assets} needed to mint ${shares}`);
      }

      this.state.totalAssets += received;
      this.mintShares(receiver, shares);
      this.logOperation('mint', ctx.callerId, received, shares);
      return { assets: received, shares };
    });
  }

  /**
   * Pays at most maxWithdraw: after a reported loss the owner gets what the shares are worth.
   */
  withdraw(ctx: ExecutionContext, assets: bigint, receiver = ctx.callerId): VaultOperationResult {
    return this.guard.run(() => {
      requirePositive(assets, 'withdraw');
      this.touchCheckpoint(ctx);

      const owner = ctx.callerId;
      const maxAssets = this.maxWithdraw(owner);
      const payout = minBigInt(assets, maxAssets);
      if (payout < assets) {
        Warn(`VaultAccounting[${this.id}]: withdraw of ${assets} capped to ${payout} for ${owner}`);
      }
      if (payout == 0n) {
        return { assets: 0n, shares: 0n };
      }

      const shares = this.convertToShares(payout, Rounding.UP);
      return this.burnAndPay(owner, receiver, payout, shares, 'withdraw');
    });
  }

  redeem(ctx: ExecutionContext, shares: bigint, receiver = ctx.callerId): VaultOperationResult {
    return this.guard.run(() => {
      requirePositive(shares, 'redeem');
      this.touchCheckpoint(ctx);

      const assets = this.convertToAssets(shares, Rounding.DOWN);
      return this.burnAndPay(ctx.callerId, receiver, assets, shares, 'redeem');
    });
  }

  /**
   * Strategy profit pulled from the manager into the vault
   */
  reportYield(ctx: ExecutionContext, amount: bigint): bigint {
    return this.guard.run(() => {
      RequireCaller(ctx, [this.state.manager], `report yield for vault ${this.id}`);
      requirePositive(amount, 'yield');
      this.touchCheckpoint(ctx);

      const received = this.ledger.transferAndMeasure(this.state.asset, ctx.callerId, this.account, amount);
      this.state.totalAssets += received;
      Log(`VaultAccounting[${this.id}]: yield of ${this.fmt(received)} ${this.state.asset} reported`);
      return received;
    });
  }

  /**
   * Strategy loss: the assets leave the vault for the manager, shares are untouched.
   */
  reportLoss(ctx: ExecutionContext, amount: bigint) {
    this.guard.run(() => {
      RequireCaller(ctx, [this.state.manager], `report a loss for vault ${this.id}`);
      requirePositive(amount, 'loss');
      if (amount > this.state.totalAssets) {
        throw new InvalidAmountError(`loss ${amount} exceeds vault assets ${this.state.totalAssets}`);
      }
      this.touchCheckpoint(ctx);

      this.state.totalAssets -= amount;
      this.ledger.transfer(this.state.asset, this.account, this.state.manager, amount);
      Warn(`VaultAccounting[${this.id}]: loss of ${this.fmt(amount)} ${this.state.asset} reported`);
    });
  }

  /**
   * Send unaccounted custody tokens to `to`
   */
  skim(ctx: ExecutionContext, to: string): bigint {
    return this.guard.run(() => {
      RequireCaller(ctx, [this.state.manager], `skim vault ${this.id}`);
      const unaccounted = this.unaccountedAssets();
      if (unaccounted > 0n) {
        this.ledger.transfer(this.state.asset, this.account, to, unaccounted);
        Log(`VaultAccounting[${this.id}]: skimmed ${this.fmt(unaccounted)} ${this.state.asset} to ${to}`);
      }
      return unaccounted;
    });
  }

  snapshot(): VaultLedgerState {
    return DeepCopy(this.state);
  }

  restore(state: VaultLedgerState) {
    this.state = DeepCopy(state);
  }

  private burnAndPay(owner: string, receiver: string, assets: bigint, shares: bigint, label: string): VaultOperationResult {
    const held = this.ledger.balanceOf(this.state.shareAsset, owner);
    if (held < shares) {
      throw new InsufficientBalanceError(this.state.shareAsset, owner, shares, held);
    }

    this.ledger.burn(this.state.shareAsset, owner, shares);
    this.state.totalShares = checkedSub(this.state.totalShares, shares, `vault ${this.id} shares`);
    if (this.state.totalShares == 0n) {
      // the last holder takes the rounding remainder, an empty vault holds no assets
      assets = this.state.totalAssets;
    }
    this.state.totalAssets = checkedSub(this.state.totalAssets, assets, `vault ${this.id} assets`);
    this.ledger.transfer(this.state.asset, this.account, receiver, assets);

    this.logOperation(label, owner, assets, shares);
    return { assets, shares };
  }

  private mintShares(receiver: string, shares: bigint) {
    this.ledger.mint(this.state.shareAsset, receiver, shares);
    this.state.totalShares += shares;
    assertInvariant(
      this.state.totalShares == this.ledger.totalSupply(this.state.shareAsset),
      `vault ${this.id} share supply out of sync`
    );
  }

  private checkInflationGuard() {
    const maxUnaccountedBps = this.state.maxUnaccountedBps;
    if (maxUnaccountedBps == undefined) {
      return;
    }

    const unaccounted = this.unaccountedAssets();
    const emptyVaultDonation = this.state.totalAssets == 0n && unaccounted > 0n;
    if (emptyVaultDonation || unaccounted * BPS > this.state.totalAssets * BigInt(maxUnaccountedBps)) {
      throw new InflationGuardTriggeredError(this.id, unaccounted);
    }
  }

  private touchCheckpoint(ctx: ExecutionContext) {
    if (this.state.checkpoint.timestamp != ctx.timestamp) {
      this.state.checkpoint = { rate: this.spotRate(), timestamp: ctx.timestamp };
    }
  }

  private logOperation(label: string, account: string, assets: bigint, shares: bigint) {
    Log(`VaultAccounting[${this.id}]: ${label} by ${account}: ${this.fmt(assets)} ${this.state.asset} <> ${shares} shares`);
  }

  private fmt(amount: bigint) {
    return norm(amount, this.ledger.decimalsOf(this.state.asset));
  }
}

function requirePositive(amount: bigint, label: string) {
  if (amount <= 0n) {
    throw new InvalidAmountError(`${label} amount must be positive, got ${amount}`);
  }
}
