import { expect } from 'chai';
import { ExecutionContext } from '../src/model/ExecutionContext';
import { PriceReading, PriceSourceEnum, SecondaryPriceSource } from '../src/model/OracleFeed';
import { PriceOracle } from '../src/services/oracle/PriceOracle';
import { ReportedPriceFeed } from '../src/services/oracle/ReportedPriceFeed';
import { SequencerUptimeFeed } from '../src/services/oracle/SequencerUptimeFeed';
import { EngineErrorCode, OracleNoDataError } from '../src/utils/Errors';
import { Ctx, E8, ExpectThrowsCode, REPORTER, T0 } from './helpers/Fixtures';

class FixedSource implements SecondaryPriceSource {
  readonly name = 'fixed';
  constructor(
    private readonly price: bigint | undefined,
    private readonly decimals = 8
  ) {}

  read(ctx: ExecutionContext, asset: string): PriceReading {
    if (this.price == undefined) {
      throw new OracleNoDataError(asset, 'fixed source empty');
    }
    return {
      asset,
      price: this.price,
      updatedAt: ctx.timestamp,
      decimals: this.decimals,
      source: PriceSourceEnum.SECONDARY
    };
  }
}

describe('PriceOracle', function () {
  let feed: ReportedPriceFeed;
  let oracle: PriceOracle;

  beforeEach(function () {
    feed = new ReportedPriceFeed([REPORTER]);
    oracle = new PriceOracle(feed);
    oracle.configureFeed({ asset: 'WETH', decimals: 8, heartbeat: 3600, maxStalenessBuffer: 300, deviationThresholdBps: 500 });
    feed.reportPrice(Ctx(REPORTER, T0), 'WETH', 3000n * E8);
  });

  it('returns a fresh primary price', function () {
    const reading = oracle.getPrice(Ctx('alice', T0 + 100), 'WETH');
    expect(reading.price).to.equal(3000n * E8);
    expect(reading.decimals).to.equal(8);
    expect(reading.updatedAt).to.equal(T0);
    expect(reading.source).to.equal(PriceSourceEnum.PRIMARY);
  });

  it('rejects a price as old as heartbeat + buffer', function () {
    expect(oracle.getPrice(Ctx('alice', T0 + 3899), 'WETH').price).to.equal(3000n * E8);
    const error = ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0 + 3900), 'WETH'), EngineErrorCode.OracleStale);
    expect(error.message).to.equal('Oracle price for WETH is stale: 3900s old, must be under 3900s');
  });

  it('reports missing data', function () {
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WBTC'), EngineErrorCode.OracleNoData);

    oracle.configureFeed({ asset: 'WBTC', decimals: 8, heartbeat: 3600, maxStalenessBuffer: 0, deviationThresholdBps: 500 });
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WBTC'), EngineErrorCode.OracleNoData);
  });

  it('treats an incomplete round as missing data', function () {
    feed.reportRound(Ctx(REPORTER, T0), 'WETH', {
      roundId: 5n,
      answer: 3000n * E8,
      startedAt: T0,
      updatedAt: T0,
      answeredInRound: 4n
    });
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WETH'), EngineErrorCode.OracleNoData);

    feed.reportRound(Ctx(REPORTER, T0), 'WETH', { roundId: 6n, answer: 3000n * E8, startedAt: 0, updatedAt: 0, answeredInRound: 6n });
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WETH'), EngineErrorCode.OracleNoData);
  });

  it('rejects non positive and future dated answers', function () {
    feed.reportPrice(Ctx(REPORTER, T0), 'WETH', 0n);
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WETH'), EngineErrorCode.OracleInvalidPrice);

    feed.reportPrice(Ctx(REPORTER, T0), 'WETH', -1n);
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WETH'), EngineErrorCode.OracleInvalidPrice);

    feed.reportPrice(Ctx(REPORTER, T0), 'WETH', 3000n * E8, T0 + 10);
    ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0), 'WETH'), EngineErrorCode.OracleInvalidPrice);
  });

  it('only lets reporters push prices', function () {
    ExpectThrowsCode(() => feed.reportPrice(Ctx('mallory', T0), 'WETH', 1n), EngineErrorCode.Unauthorized);
  });

  it('numbers rounds and marks them answered', function () {
    const round = feed.reportPrice(Ctx(REPORTER, T0 + 5), 'WETH', 3100n * E8);
    expect(round.roundId).to.equal(2n);
    expect(round.answeredInRound).to.equal(2n);
    expect(round.updatedAt).to.equal(T0 + 5);
  });

  describe('execution liveness', function () {
    let sequencer: SequencerUptimeFeed;

    beforeEach(function () {
      sequencer = new SequencerUptimeFeed([REPORTER]);
      oracle = new PriceOracle(feed, { feed: sequencer, gracePeriod: 3600 });
      oracle.configureFeed({ asset: 'WETH', decimals: 8, heartbeat: 3600, maxStalenessBuffer: 300, deviationThresholdBps: 500 });
    });

    it('halts while the sequencer is down and during the grace period', function () {
      expect(oracle.getPrice(Ctx('alice', T0 + 10), 'WETH').price).to.equal(3000n * E8);

      sequencer.reportStatus(Ctx(REPORTER, T0 + 10), false);
      ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0 + 20), 'WETH'), EngineErrorCode.ExecutionHalted);

      sequencer.reportStatus(Ctx(REPORTER, T0 + 30), true);
      ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0 + 100), 'WETH'), EngineErrorCode.ExecutionHalted);
      expect(oracle.getPrice(Ctx('alice', T0 + 3630), 'WETH').price).to.equal(3000n * E8);
    });

    it('checks staleness before liveness', function () {
      sequencer.reportStatus(Ctx(REPORTER, T0 + 10), false);
      ExpectThrowsCode(() => oracle.getPrice(Ctx('alice', T0 + 4000), 'WETH'), EngineErrorCode.OracleStale);
    });

    it('never bypasses a halt through the fallback', function () {
      oracle.setSecondarySource('WETH', new FixedSource(3000n * E8));
      sequencer.reportStatus(Ctx(REPORTER, T0 + 10), false);
      ExpectThrowsCode(() => oracle.getPriceWithFallback(Ctx('alice', T0 + 4000), 'WETH'), EngineErrorCode.ExecutionHalted);
      ExpectThrowsCode(() => oracle.getPriceWithFallback(Ctx('alice', T0 + 20), 'WETH'), EngineErrorCode.ExecutionHalted);
    });
  });

  describe('fallback', function () {
    it('uses the secondary source when the primary is stale', function () {
      oracle.setSecondarySource('WETH', new FixedSource(2_950n * 10n ** 6n, 6));
      const reading = oracle.getPriceWithFallback(Ctx('alice', T0 + 4000), 'WETH');
      expect(reading.source).to.equal(PriceSourceEnum.SECONDARY);
      expect(reading.price).to.equal(2950n * E8);
      expect(reading.decimals).to.equal(8);
    });

    it('rethrows the primary error without a secondary source', function () {
      ExpectThrowsCode(() => oracle.getPriceWithFallback(Ctx('alice', T0 + 4000), 'WETH'), EngineErrorCode.OracleStale);
    });

    it('fails when fresh sources disagree beyond the threshold', function () {
      oracle.setSecondarySource('WETH', new FixedSource(3200n * E8));
      const error = ExpectThrowsCode(
        () => oracle.getPriceWithFallback(Ctx('alice', T0 + 10), 'WETH'),
        EngineErrorCode.OracleMismatch
      );
      expect(error.message).to.equal(
        'Oracle sources disagree for WETH: primary 300000000000 vs secondary 320000000000 (666 bps)'
      );
    });

    it('keeps the primary price when the sources agree', function () {
      oracle.setSecondarySource('WETH', new FixedSource(3100n * E8));
      const reading = oracle.getPriceWithFallback(Ctx('alice', T0 + 10), 'WETH');
      expect(reading.source).to.equal(PriceSourceEnum.PRIMARY);
      expect(reading.price).to.equal(3000n * E8);
    });

    it('keeps the primary price when the secondary has no data', function () {
      oracle.setSecondarySource('WETH', new FixedSource(undefined));
      expect(oracle.getPriceWithFallback(Ctx('alice', T0 + 10), 'WETH').price).to.equal(3000n * E8);
    });
  });
});
