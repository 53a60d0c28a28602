import { ExecutionContext } from '../../model/ExecutionContext';
import { PrimaryPriceFeed, RoundData } from '../../model/OracleFeed';
import { WAD } from '../../utils/Constants';
import { mulDiv } from '../../utils/FixedPointMath';
import { TokenLedger } from '../ledger/TokenLedger';
import { VaultRegistry } from '../vault/VaultRegistry';

/**
 * Prices a vault share as underlying price * conservative share rate. Round metadata is the
 * underlying round's, so staleness and completeness checks carry over unchanged.
 */
export class VaultSharePriceFeed implements PrimaryPriceFeed {
  readonly version = 'vault-share-feed-v1';

  constructor(
    private readonly ledger: TokenLedger,
    private readonly underlyingFeed: PrimaryPriceFeed,
    private readonly vaults: VaultRegistry,
    private readonly vaultId: string
  ) {}

  latestRoundData(asset: string, ctx: ExecutionContext): RoundData | undefined {
    const vault = this.vaults.getVault(this.vaultId);
    const round = this.underlyingFeed.latestRoundData(vault.asset, ctx);
    if (!round || round.answer <= 0n) {
      return round;
    }

    // rate is raw assets per raw share (wad): scale to whole assets per whole share
    const rate = vault.conservativeRate(ctx);
    const assetDecimals = this.ledger.decimalsOf(vault.asset);
    const shareDecimals = this.ledger.decimalsOf(asset);
    const answer = mulDiv(round.answer * rate, 10n ** BigInt(shareDecimals), WAD * 10n ** BigInt(assetDecimals));

    return { ...round, answer };
  }
}
