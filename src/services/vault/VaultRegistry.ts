import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { VaultConfig, VaultLedgerState } from '../../model/Vault';
import { RequireCaller } from '../../utils/AccessControl';
import { BPS, DEFAULT_VIRTUAL_SHARES } from '../../utils/Constants';
import { ConfigurationError, UnknownVaultError } from '../../utils/Errors';
import { Log } from '../../utils/Logger';
import { TokenLedger } from '../ledger/TokenLedger';
import { VaultAccounting } from './VaultAccounting';

export class VaultRegistry implements Checkpointable<{ [vaultId: string]: VaultLedgerState }> {
  private vaults = new Map<string, VaultAccounting>();

  constructor(
    private readonly ledger: TokenLedger,
    private readonly admins: string[]
  ) {}

  /**
   * Create a vault and register its share token. Share decimals are the asset decimals plus the
   * decimal offset of `virtualShares`, which must be a power of ten.
   */
  createVault(ctx: ExecutionContext, config: VaultConfig): VaultAccounting {
    RequireCaller(ctx, this.admins, 'create a vault');
    if (this.vaults.has(config.id)) {
      throw new ConfigurationError(`vault ${config.id} already exists`);
    }

    const virtualShares = config.virtualShares ?? DEFAULT_VIRTUAL_SHARES;
    const offset = GetDecimalsOffset(virtualShares);
    if (offset == undefined) {
      throw new ConfigurationError(`vault ${config.id}: virtualShares ${virtualShares} is not a power of ten`);
    }
    if (config.maxUnaccountedBps != undefined && (config.maxUnaccountedBps < 0 || config.maxUnaccountedBps > Number(BPS))) {
      throw new ConfigurationError(`vault ${config.id}: invalid maxUnaccountedBps ${config.maxUnaccountedBps}`);
    }

    const asset = this.ledger.getAsset(config.asset);
    this.ledger.registerAsset({
      id: config.shareAsset,
      symbol: `v${asset.symbol}`,
      decimals: asset.decimals + offset
    });

    const vault = new VaultAccounting(this.ledger, {
      id: config.id,
      asset: config.asset,
      shareAsset: config.shareAsset,
      manager: config.manager,
      virtualShares,
      maxUnaccountedBps: config.maxUnaccountedBps,
      totalAssets: 0n,
      totalShares: 0n,
      checkpoint: { rate: 0n, timestamp: -1 }
    });
    this.vaults.set(config.id, vault);

    Log(`VaultRegistry: created vault ${config.id} on ${config.asset}, shares ${config.shareAsset}`);
    return vault;
  }

  getVault(vaultId: string): VaultAccounting {
    const vault = this.vaults.get(vaultId);
    if (!vault) {
      throw new UnknownVaultError(vaultId);
    }
    return vault;
  }

  getVaultIds(): string[] {
    return Array.from(this.vaults.keys());
  }

  snapshot(): { [vaultId: string]: VaultLedgerState } {
    const states: { [vaultId: string]: VaultLedgerState } = {};
    for (const [vaultId, vault] of this.vaults) {
      states[vaultId] = vault.snapshot();
    }
    return states;
  }

  restore(states: { [vaultId: string]: VaultLedgerState }) {
    for (const vaultId of Array.from(this.vaults.keys())) {
      if (!states[vaultId]) {
        this.vaults.delete(vaultId);
      }
    }
    for (const [vaultId, state] of Object.entries(states)) {
      const vault = this.vaults.get(vaultId);
      if (vault) {
        vault.restore(state);
      } else {
        this.vaults.set(vaultId, new VaultAccounting(this.ledger, state));
      }
    }
  }
}

/**
 * log10 of a power of ten, undefined otherwise
 */
export function GetDecimalsOffset(virtualShares: bigint): number | undefined {
  if (virtualShares < 1n) {
    return undefined;
  }
  let offset = 0;
  let remaining = virtualShares;
  while (remaining % 10n == 0n) {
    remaining /= 10n;
    offset++;
  }
  return remaining == 1n ? offset : undefined;
}
