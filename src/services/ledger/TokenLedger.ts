import { AssetConfig } from '../../model/Asset';
import { Checkpointable } from '../../model/Checkpoint';
import { TokenLedgerState } from '../../model/EngineState';
import { ConfigurationError, InsufficientBalanceError, InvalidAmountError } from '../../utils/Errors';
import { bpsMul, checkedSub } from '../../utils/FixedPointMath';
import { DeepCopy } from '../../utils/Utils';

/**
 * Called after every transfer of the asset it is registered for. May call back into any component.
 */
export type TransferHook = (asset: string, from: string, to: string, received: bigint) => void;

/**
 * Custody of every asset the engine moves. Components hold their funds in named accounts
 * (`lending:pool`, `amm:<id>`, `vault:<id>`...) and measure balance deltas around transfers.
 */
export class TokenLedger implements Checkpointable<TokenLedgerState> {
  private state: TokenLedgerState = { assets: {}, balances: {} };
  private hooks: { [asset: string]: TransferHook } = {};

  registerAsset(config: AssetConfig) {
    if (this.state.assets[config.id]) {
      throw new ConfigurationError(`asset ${config.id} already registered`);
    }
    if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 36) {
      throw new ConfigurationError(`asset ${config.id} has invalid decimals ${config.decimals}`);
    }
    const transferFeeBps = config.transferFeeBps ?? 0;
    if (transferFeeBps < 0 || transferFeeBps >= 10_000) {
      throw new ConfigurationError(`asset ${config.id} has invalid transfer fee ${transferFeeBps}`);
    }

    this.state.assets[config.id] = { ...config };
    this.state.balances[config.id] = {};
  }

  hasAsset(asset: string): boolean {
    return this.state.assets[asset] != undefined;
  }

  getAsset(asset: string): AssetConfig {
    const config = this.state.assets[asset];
    if (!config) {
      throw new ConfigurationError(`unknown asset ${asset}`);
    }
    return config;
  }

  decimalsOf(asset: string): number {
    return this.getAsset(asset).decimals;
  }

  setTransferHook(asset: string, hook: TransferHook | undefined) {
    this.getAsset(asset);
    if (hook) {
      this.hooks[asset] = hook;
    } else {
      delete this.hooks[asset];
    }
  }

  balanceOf(asset: string, account: string): bigint {
    return this.getBalances(asset)[account] ?? 0n;
  }

  totalSupply(asset: string): bigint {
    return Object.values(this.getBalances(asset)).reduce((acc, balance) => acc + balance, 0n);
  }

  mint(asset: string, to: string, amount: bigint) {
    checkAmount(amount);
    const balances = this.getBalances(asset);
    balances[to] = (balances[to] ?? 0n) + amount;
  }

  burn(asset: string, from: string, amount: bigint) {
    checkAmount(amount);
    const balances = this.getBalances(asset);
    const available = balances[from] ?? 0n;
    if (available < amount) {
      throw new InsufficientBalanceError(asset, from, amount, available);
    }
    setBalance(balances, from, checkedSub(available, amount, `${asset} balance of ${from}`));
  }

  /**
   * Move `amount` from one account to another. Fee-on-transfer assets deliver less than `amount`.
   */
  transfer(asset: string, from: string, to: string, amount: bigint) {
    checkAmount(amount);
    if (amount == 0n) {
      return;
    }

    const config = this.getAsset(asset);
    const balances = this.getBalances(asset);
    const available = balances[from] ?? 0n;
    if (available < amount) {
      throw new InsufficientBalanceError(asset, from, amount, available);
    }

    const fee = bpsMul(amount, config.transferFeeBps ?? 0);
    const received = amount - fee;
    setBalance(balances, from, checkedSub(available, amount, `${asset} balance of ${from}`));
    balances[to] = (balances[to] ?? 0n) + received;

    const hook = this.hooks[asset];
    if (hook) {
      hook(asset, from, to, received);
    }
  }

  /**
   * Transfer and return what `to` actually gained, which is the only amount callers may credit.
   */
  transferAndMeasure(asset: string, from: string, to: string, amount: bigint): bigint {
    const before = this.balanceOf(asset, to);
    this.transfer(asset, from, to, amount);
    return this.balanceOf(asset, to) - before;
  }

  snapshot(): TokenLedgerState {
    return DeepCopy(this.state);
  }

  restore(state: TokenLedgerState) {
    this.state = DeepCopy(state);
  }

  private getBalances(asset: string): { [account: string]: bigint } {
    const balances = this.state.balances[asset];
    if (!balances) {
      throw new ConfigurationError(`unknown asset ${asset}`);
    }
    return balances;
  }
}

function checkAmount(amount: bigint) {
  if (amount < 0n) {
    throw new InvalidAmountError(`negative amount ${amount}`);
  }
}

function setBalance(balances: { [account: string]: bigint }, account: string, value: bigint) {
  if (value == 0n) {
    delete balances[account];
  } else {
    balances[account] = value;
  }
}
