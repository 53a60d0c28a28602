import { ExecutionContext } from '../../model/ExecutionContext';
import { PriceReading, PriceSourceEnum, SecondaryPriceSource } from '../../model/OracleFeed';
import { WAD } from '../../utils/Constants';
import { mulDiv } from '../../utils/FixedPointMath';
import { AmmRegistry } from '../amm/AmmRegistry';
import { TokenLedger } from '../ledger/TokenLedger';

/**
 * Secondary price from an AMM pool's time weighted average. The pool's other asset is taken as the
 * unit of account, so the pool must pair the asset with the feed's quote (a USD stablecoin for USD feeds).
 */
export class TwapPriceSource implements SecondaryPriceSource {
  readonly name: string;

  constructor(
    private readonly ledger: TokenLedger,
    private readonly pools: AmmRegistry,
    private readonly poolId: string,
    private readonly window: number
  ) {
    this.name = `twap(${poolId}, ${window}s)`;
  }

  read(ctx: ExecutionContext, asset: string, decimals: number): PriceReading {
    const pool = this.pools.getPool(this.poolId);
    const [assetA, assetB] = pool.assets;
    const quote = asset == assetA ? assetB : assetA;
    const twap = pool.consultTwap(ctx, asset, this.window);

    // raw quote units per raw asset unit (wad) => whole quote per whole asset at `decimals`
    const assetDecimals = this.ledger.decimalsOf(asset);
    const quoteDecimals = this.ledger.decimalsOf(quote);
    const price = mulDiv(
      twap.price * 10n ** BigInt(assetDecimals),
      10n ** BigInt(decimals),
      10n ** BigInt(quoteDecimals) * WAD
    );

    return { asset, price, updatedAt: twap.updatedAt, decimals, source: PriceSourceEnum.SECONDARY };
  }
}
