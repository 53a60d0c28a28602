export interface VaultConfig {
  id: string;
  asset: string;
  shareAsset: string; // ledger asset minted as vault shares
  manager: string; // allowed to report yield/loss and skim
  virtualShares?: bigint;
  maxUnaccountedBps?: number; // inflation guard, disabled when undefined
}

export interface VaultRateCheckpoint {
  rate: bigint; // wad, assets per share unit before the first mutation at `timestamp`
  timestamp: number;
}

export interface VaultLedgerState {
  id: string;
  asset: string;
  shareAsset: string;
  manager: string;
  virtualShares: bigint;
  maxUnaccountedBps?: number;
  totalAssets: bigint;
  totalShares: bigint;
  checkpoint: VaultRateCheckpoint;
}

export interface VaultOperationResult {
  assets: bigint;
  shares: bigint;
}
