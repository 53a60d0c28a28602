import { AssetConfig } from './Asset';
import { AmmPoolState } from './AmmPool';
import { LiquidationEngineState } from './Auction';
import { FlashLoanState } from './FlashLoan';
import { ReportedFeedState, SequencerState } from './OracleFeed';
import { CollateralReserve, LiquidityReserve } from './ReserveConfig';
import { Position } from './Position';
import { VaultLedgerState } from './Vault';

export interface TokenLedgerState {
  assets: { [asset: string]: AssetConfig };
  balances: { [asset: string]: { [account: string]: bigint } };
}

export interface LendingPoolState {
  reserves: { [asset: string]: CollateralReserve };
  liquidity: { [asset: string]: LiquidityReserve };
  positions: { [positionKey: string]: Position };
}

export interface ExecutorState {
  txCount: number;
  lastTimestamp: number;
}

export interface EngineState {
  executor: ExecutorState;
  ledger: TokenLedgerState;
  priceFeed: ReportedFeedState;
  sequencer: SequencerState;
  lendingPool: LendingPoolState;
  liquidation: LiquidationEngineState;
  pools: { [poolId: string]: AmmPoolState };
  vaults: { [vaultId: string]: VaultLedgerState };
  flashLoans: FlashLoanState;
}

/**
 * Persisted engine state file
 */
export interface EngineStateFileStructure {
  updated: number;
  updatedHuman: string;
  state: EngineState;
}
