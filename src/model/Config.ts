import { AssetConfig } from './Asset';
import { AmmPoolConfig } from './AmmPool';
import { AuctionConfig } from './Auction';
import { FlashLoanConfig } from './FlashLoan';
import { FeedConfig } from './OracleFeed';
import { ReserveConfig } from './ReserveConfig';
import { VaultConfig } from './Vault';

/**
 * Structure of the engine configuration file (bigints written as "123n")
 */
export interface EngineConfig {
  admins: string[];
  priceReporters: string[];
  assets: AssetConfig[];
  oracle: OracleConfig;
  debtAssets: string[];
  reserves: ReserveConfig[];
  pools: AmmPoolConfig[];
  vaults: VaultConfig[];
  auction: AuctionConfig;
  flashLoan: FlashLoanConfig;
}

export interface OracleConfig {
  feeds: FeedConfig[];
  sequencer?: SequencerConfig;
  twapSources?: TwapSourceConfig[];
  vaultShareFeeds?: VaultShareFeedConfig[];
}

export interface SequencerConfig {
  gracePeriod: number; // sec after recovery before prices are trusted again
}

export interface TwapSourceConfig {
  asset: string;
  poolId: string;
  window: number; // sec
}

/**
 * Prices a vault share from the underlying asset's feed and the vault's conservative share rate
 */
export interface VaultShareFeedConfig {
  shareAsset: string;
  vaultId: string;
}
