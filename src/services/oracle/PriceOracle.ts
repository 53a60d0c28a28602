import { ExecutionContext } from '../../model/ExecutionContext';
import {
  ExecutionLivenessFeed,
  FeedConfig,
  PriceReading,
  PriceSourceEnum,
  PrimaryPriceFeed,
  SecondaryPriceSource
} from '../../model/OracleFeed';
import { BPS } from '../../utils/Constants';
import {
  ConfigurationError,
  EngineErrorCode,
  ExecutionHaltedError,
  LendingEngineError,
  OracleInvalidPriceError,
  OracleMismatchError,
  OracleNoDataError,
  OracleStaleError
} from '../../utils/Errors';
import { absBigInt, mulDiv } from '../../utils/FixedPointMath';
import { Warn } from '../../utils/Logger';
import { Rescale } from '../../utils/TokenUtils';

export interface LivenessConfig {
  feed: ExecutionLivenessFeed;
  gracePeriod: number;
}

const FALLBACK_CODES = [EngineErrorCode.OracleNoData, EngineErrorCode.OracleInvalidPrice, EngineErrorCode.OracleStale];

/**
 * Validated prices for every configured asset.
 *
 * The primary feed is injected; an asset may override it (vault shares are priced by their own feed).
 * A secondary source per asset is only consulted by `getPriceWithFallback`.
 */
export class PriceOracle {
  private feeds: { [asset: string]: FeedConfig } = {};
  private primaryOverrides: { [asset: string]: PrimaryPriceFeed } = {};
  private secondarySources: { [asset: string]: SecondaryPriceSource } = {};

  constructor(
    private readonly primary: PrimaryPriceFeed,
    private readonly liveness?: LivenessConfig
  ) {}

  configureFeed(config: FeedConfig) {
    if (config.heartbeat <= 0 || config.maxStalenessBuffer < 0) {
      throw new ConfigurationError(`feed ${config.asset}: heartbeat must be > 0 and buffer >= 0`);
    }
    if (config.deviationThresholdBps <= 0 || config.deviationThresholdBps > Number(BPS)) {
      throw new ConfigurationError(`feed ${config.asset}: invalid deviation threshold ${config.deviationThresholdBps}`);
    }
    this.feeds[config.asset] = { ...config };
  }

  setPrimaryFeed(asset: string, feed: PrimaryPriceFeed) {
    this.primaryOverrides[asset] = feed;
  }

  setSecondarySource(asset: string, source: SecondaryPriceSource) {
    this.secondarySources[asset] = source;
  }

  hasFeed(asset: string): boolean {
    return this.feeds[asset] != undefined;
  }

  getFeedConfig(asset: string): FeedConfig | undefined {
    return this.feeds[asset];
  }

  primaryFeedOf(asset: string): PrimaryPriceFeed {
    return this.primaryOverrides[asset] ?? this.primary;
  }

  getPrice(ctx: ExecutionContext, asset: string): PriceReading {
    const feed = this.feeds[asset];
    if (!feed) {
      throw new OracleNoDataError(asset, 'feed not configured');
    }

    const round = this.primaryFeedOf(asset).latestRoundData(asset, ctx);
    if (!round) {
      throw new OracleNoDataError(asset, 'no round reported');
    }
    if (round.updatedAt == 0) {
      throw new OracleNoDataError(asset, `round ${round.roundId} never updated`);
    }
    if (round.answeredInRound < round.roundId) {
      throw new OracleNoDataError(asset, `round ${round.roundId} answered in round ${round.answeredInRound}`);
    }

    if (round.answer <= 0n) {
      throw new OracleInvalidPriceError(asset, `non positive answer ${round.answer}`);
    }
    if (round.updatedAt > ctx.timestamp) {
      throw new OracleInvalidPriceError(asset, `updatedAt ${round.updatedAt} is in the future (now ${ctx.timestamp})`);
    }

    const age = ctx.timestamp - round.updatedAt;
    const maxAge = feed.heartbeat + feed.maxStalenessBuffer;
    if (age >= maxAge) {
      throw new OracleStaleError(asset, age, maxAge);
    }

    this.checkLiveness(ctx);

    return {
      asset,
      price: round.answer,
      updatedAt: round.updatedAt,
      decimals: feed.decimals,
      source: PriceSourceEnum.PRIMARY
    };
  }

  /**
   * Primary price cross-checked against the secondary source; the secondary replaces a primary that
   * has no data, an invalid answer or a stale one. A halted execution environment is never bypassed.
   */
  getPriceWithFallback(ctx: ExecutionContext, asset: string): PriceReading {
    const secondary = this.secondarySources[asset];

    let primaryReading: PriceReading;
    try {
      primaryReading = this.getPrice(ctx, asset);
    } catch (e) {
      if (!secondary || !(e instanceof LendingEngineError) || !FALLBACK_CODES.includes(e.code)) {
        throw e;
      }

      this.checkLiveness(ctx);
      Warn(`PriceOracle: primary price unusable for ${asset} (${e.message}), using ${secondary.name}`);
      return this.readSecondary(ctx, asset, secondary);
    }

    if (!secondary) {
      return primaryReading;
    }

    let secondaryReading: PriceReading;
    try {
      secondaryReading = this.readSecondary(ctx, asset, secondary);
    } catch (e) {
      if (e instanceof LendingEngineError && FALLBACK_CODES.includes(e.code)) {
        Warn(`PriceOracle: cannot cross check ${asset} with ${secondary.name}: ${e.message}`);
        return primaryReading;
      }
      throw e;
    }

    const feed = this.requireFeed(asset);
    const deviation = mulDiv(absBigInt(primaryReading.price - secondaryReading.price), BPS, primaryReading.price);
    if (deviation > BigInt(feed.deviationThresholdBps)) {
      throw new OracleMismatchError(asset, primaryReading.price, secondaryReading.price, deviation);
    }

    return primaryReading;
  }

  private readSecondary(ctx: ExecutionContext, asset: string, source: SecondaryPriceSource): PriceReading {
    const feed = this.requireFeed(asset);
    const reading = source.read(ctx, asset, feed.decimals);
    if (reading.price <= 0n) {
      throw new OracleInvalidPriceError(asset, `${source.name} returned ${reading.price}`);
    }

    return {
      asset,
      price: Rescale(reading.price, reading.decimals, feed.decimals),
      updatedAt: reading.updatedAt,
      decimals: feed.decimals,
      source: PriceSourceEnum.SECONDARY
    };
  }

  private checkLiveness(ctx: ExecutionContext) {
    if (!this.liveness) {
      return;
    }

    if (!this.liveness.feed.isExecutionLive()) {
      throw new ExecutionHaltedError('sequencer is down');
    }
    const upFor = ctx.timestamp - this.liveness.feed.liveSince();
    if (upFor < this.liveness.gracePeriod) {
      throw new ExecutionHaltedError(`sequencer up for ${upFor}s, grace period is ${this.liveness.gracePeriod}s`);
    }
  }

  private requireFeed(asset: string): FeedConfig {
    const feed = this.feeds[asset];
    if (!feed) {
      throw new OracleNoDataError(asset, 'feed not configured');
    }
    return feed;
  }
}
