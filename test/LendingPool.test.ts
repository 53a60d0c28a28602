import { expect } from 'chai';
import { LendingEngine } from '../src/LendingEngine';
import { LENDING_POOL_ACCOUNT } from '../src/services/lending/LendingPool';
import { EngineErrorCode } from '../src/utils/Errors';
import {
  ADMIN,
  ALICE,
  BOB,
  CreateTestEngine,
  Ctx,
  E18,
  E6,
  E8,
  ExpectFailure,
  ExpectSuccess,
  LP,
  REPORTER,
  T0,
  WETH_RESERVE
} from './helpers/Fixtures';

const RATE_5_PCT = 1000000001547125957863212448n; // per second, 5% a year
const YEAR = 31_536_000;

function OpenPosition(engine: LendingEngine, collateral: bigint, debt: bigint, timestamp = T0) {
  engine.ledger.mint('WETH', ALICE, collateral);
  ExpectSuccess(engine.supply(Ctx(ALICE, timestamp), 'WETH', collateral));
  if (debt > 0n) {
    ExpectSuccess(engine.borrow(Ctx(ALICE, timestamp), 'WETH', debt));
  }
}

describe('LendingPool', function () {
  describe('health factor', function () {
    it('normalizes asset and feed decimals', function () {
      const engine = CreateTestEngine();
      OpenPosition(engine, 2n * E18, 3_000n * E6);

      expect(engine.healthFactor(Ctx(ALICE, T0), ALICE, 'WETH').toString()).to.equal('1.65');
      expect(engine.lendingPool.healthFactorWad(Ctx(ALICE, T0), ALICE, 'WETH')).to.equal(1_650_000_000_000_000_000n);
    });

    it('is infinite without debt', function () {
      const engine = CreateTestEngine();
      OpenPosition(engine, 2n * E18, 0n);

      expect(engine.healthFactor(Ctx(ALICE, T0), ALICE, 'WETH').toString()).to.equal('Infinity');
      expect(engine.healthFactor(Ctx(ALICE, T0), 'nobody', 'WETH').isFinite()).to.equal(false);
    });
  });

  describe('borrowing', function () {
    let engine: LendingEngine;

    beforeEach(function () {
      engine = CreateTestEngine();
      OpenPosition(engine, 2n * E18, 0n);
    });

    it('lends up to the loan to value', function () {
      ExpectFailure(engine.borrow(Ctx(ALICE, T0), 'WETH', 4_800n * E6 + 1n), EngineErrorCode.InsufficientCollateral);

      const position = ExpectSuccess(engine.borrow(Ctx(ALICE, T0), 'WETH', 4_800n * E6));
      expect(position.debt).to.equal(4_800n * E6);
      expect(position.debtAsset).to.equal('USDC');
      expect(engine.ledger.balanceOf('USDC', ALICE)).to.equal(4_800n * E6);
    });

    it('refuses a withdrawal that breaks the liquidation threshold', function () {
      ExpectSuccess(engine.borrow(Ctx(ALICE, T0), 'WETH', 3_000n * E6));

      const error = ExpectFailure(engine.withdraw(Ctx(ALICE, T0), 'WETH', E18), EngineErrorCode.HealthFactorTooLow);
      expect(error.message).to.equal('Health factor would drop below 1: 825000000000000000 (wad)');

      const position = ExpectSuccess(engine.withdraw(Ctx(ALICE, T0), 'WETH', 6n * 10n ** 17n));
      expect(position.collateralAmount).to.equal(14n * 10n ** 17n);
      expect(engine.ledger.balanceOf('WETH', ALICE)).to.equal(6n * 10n ** 17n);
    });

    it('cannot withdraw more collateral than deposited', function () {
      ExpectFailure(engine.withdraw(Ctx(ALICE, T0), 'WETH', 2n * E18 + 1n), EngineErrorCode.InsufficientCollateral);
    });

    it('enforces the minimum debt', function () {
      const error = ExpectFailure(engine.borrow(Ctx(ALICE, T0), 'WETH', 50n * E6), EngineErrorCode.MinimumDebtViolation);
      expect(error.message).to.equal('Debt for WETH would be 50000000, below the minimum of 100000000');

      ExpectSuccess(engine.borrow(Ctx(ALICE, T0), 'WETH', 3_000n * E6));
      ExpectFailure(engine.repay(Ctx(ALICE, T0), 'WETH', 2_950n * E6), EngineErrorCode.MinimumDebtViolation);
      expect(ExpectSuccess(engine.repay(Ctx(ALICE, T0), 'WETH', 3_000n * E6)).debt).to.equal(0n);
    });

    it('aborts when the collateral price is stale', function () {
      const before = engine.fingerprint();
      const error = ExpectFailure(engine.borrow(Ctx(ALICE, T0 + 3900), 'WETH', 1_000n * E6), EngineErrorCode.OracleStale);
      expect(error.message).to.equal('Oracle price for WETH is stale: 3900s old, must be under 3900s');
      expect(engine.fingerprint()).to.equal(before);
      expect(engine.ledger.balanceOf('USDC', ALICE)).to.equal(0n);
    });

    it('caps a repayment at the outstanding debt', function () {
      ExpectSuccess(engine.borrow(Ctx(ALICE, T0), 'WETH', 3_000n * E6));
      engine.ledger.mint('USDC', ALICE, 500n * E6);

      const position = ExpectSuccess(engine.repay(Ctx(ALICE, T0 + 10), 'WETH', 10_000n * E6));
      expect(position.debt).to.equal(0n);
      expect(position.collateralAmount).to.equal(2n * E18);
      expect(engine.ledger.balanceOf('USDC', ALICE)).to.equal(500n * E6);

      const error = ExpectFailure(engine.repay(Ctx(ALICE, T0 + 10), 'WETH', 1n), EngineErrorCode.InvalidAmount);
      expect(error.message).to.equal('Invalid amount: nothing to repay on alice/WETH');
    });

    it('forgets a position once it is empty', function () {
      ExpectSuccess(engine.withdraw(Ctx(ALICE, T0), 'WETH', 2n * E18));
      expect(engine.getPosition(Ctx(ALICE, T0), ALICE, 'WETH')).to.equal(undefined);
      expect(engine.lendingPool.getPositions()).to.deep.equal([]);
    });

    it('rejects unknown collateral', function () {
      ExpectFailure(engine.supply(Ctx(ALICE, T0), 'WBTC', 1n), EngineErrorCode.UnknownReserve);
    });
  });

  describe('limits', function () {
    it('enforces the debt ceiling', function () {
      const engine = CreateTestEngine({ reserve: { debtCeiling: 1_000n * E6 } });
      OpenPosition(engine, 2n * E18, 0n);

      const error = ExpectFailure(engine.borrow(Ctx(ALICE, T0), 'WETH', 1_500n * E6), EngineErrorCode.DebtCeilingExceeded);
      expect(error.message).to.equal('Debt ceiling exceeded for WETH: 1500000000 > 1000000000');
      ExpectSuccess(engine.borrow(Ctx(ALICE, T0), 'WETH', 1_000n * E6));
    });

    it('cannot lend more than the cash on hand', function () {
      const engine = CreateTestEngine({ liquidity: 1_000n * E6 });
      OpenPosition(engine, 2n * E18, 0n);

      ExpectFailure(engine.borrow(Ctx(ALICE, T0), 'WETH', 2_000n * E6), EngineErrorCode.InsufficientLiquidity);
    });
  });

  describe('interest', function () {
    let engine: LendingEngine;

    beforeEach(function () {
      engine = CreateTestEngine({ reserve: { borrowRatePerSecond: RATE_5_PCT } });
      OpenPosition(engine, 2n * E18, 3_000n * E6);
    });

    it('accrues once per timestamp', function () {
      const first = ExpectSuccess(engine.accrueInterest(Ctx(ALICE, T0 + 3600), 'WETH'));
      const second = ExpectSuccess(engine.accrueInterest(Ctx(ALICE, T0 + 3600), 'WETH'));
      expect(first).to.equal(1000005569668954547626342464n);
      expect(second).to.equal(first);
      expect(engine.lendingPool.getReserve('WETH').index).to.deep.equal({ cumulativeRate: first, lastUpdate: T0 + 3600 });
    });

    it('compounds per second over a year', function () {
      const ctx = Ctx(ALICE, T0 + YEAR);
      expect(ExpectSuccess(engine.accrueInterest(ctx, 'WETH'))).to.equal(1049999999999999999961070145n);

      const position = engine.getPosition(ctx, ALICE, 'WETH');
      expect(position?.normalizedDebt).to.equal(3_000n * E6);
      expect(position?.debt).to.equal(3_150n * E6);
      expect(engine.lendingPool.totalDebt(ctx, 'WETH')).to.equal(3_150n * E6);
      expect(engine.lendingPool.liquidityAssets(ctx, 'USDC')).to.equal(1000149999999n);
    });

    it('books a borrow at a grown index as exactly the amount borrowed', function () {
      const ctx = Ctx(BOB, T0 + 3600);
      engine.ledger.mint('WETH', BOB, E18);
      ExpectSuccess(engine.supply(ctx, 'WETH', E18));

      const borrowed = ExpectSuccess(engine.borrow(ctx, 'WETH', 1_234_567_891n));
      expect(borrowed.debt).to.equal(1_234_567_891n);
      expect(engine.getPosition(ctx, BOB, 'WETH')?.debt).to.equal(1_234_567_891n);

      const repaid = ExpectSuccess(engine.repay(ctx, 'WETH', 1_234_567_891n));
      expect(repaid.debt).to.equal(0n);
      expect(repaid.normalizedDebt).to.equal(0n);
      expect(engine.ledger.balanceOf('USDC', BOB)).to.equal(0n);
    });

    it('accrues at the old rate before a reconfiguration', function () {
      ExpectSuccess(engine.configureReserve(Ctx(ADMIN, T0 + 3600), { ...WETH_RESERVE, borrowRatePerSecond: RATE_5_PCT * 2n - 10n ** 27n }));
      expect(engine.lendingPool.getReserve('WETH').index.cumulativeRate).to.equal(1000005569668954547626342464n);
    });
  });

  describe('liquidity providers', function () {
    it('mints shares with the virtual offset and pays them back', function () {
      const engine = CreateTestEngine();
      expect(engine.lendingPool.liquiditySharesOf('USDC', LP)).to.equal(10n ** 15n);

      expect(ExpectSuccess(engine.removeLiquidity(Ctx(LP, T0 + 10), 'USDC', 10n ** 15n))).to.equal(10n ** 12n);
      expect(engine.ledger.balanceOf('USDC', LP)).to.equal(10n ** 12n);
      expect(engine.ledger.balanceOf('USDC', LENDING_POOL_ACCOUNT)).to.equal(0n);
    });

    it('keeps lent out cash from being withdrawn', function () {
      const engine = CreateTestEngine({ liquidity: 4_000n * E6 });
      OpenPosition(engine, 2n * E18, 3_000n * E6);

      ExpectFailure(engine.removeLiquidity(Ctx(LP, T0 + 10), 'USDC', 4n * 10n ** 12n), EngineErrorCode.InsufficientLiquidity);
    });
  });

  it('credits fee on transfer collateral with what arrived', function () {
    const engine = CreateTestEngine();
    const admin = Ctx(ADMIN, T0);
    ExpectSuccess(engine.registerAsset(admin, { id: 'FOT', symbol: 'FOT', decimals: 18, transferFeeBps: 100 }));
    engine.configureFeed(admin, { asset: 'FOT', decimals: 8, heartbeat: 3600, maxStalenessBuffer: 300, deviationThresholdBps: 500 });
    ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'FOT', 10n * E8));
    ExpectSuccess(engine.configureReserve(admin, { ...WETH_RESERVE, asset: 'FOT' }));

    engine.ledger.mint('FOT', ALICE, 100n * E18);
    const position = ExpectSuccess(engine.supply(Ctx(ALICE, T0), 'FOT', 100n * E18));
    expect(position.collateralAmount).to.equal(99n * E18);
    expect(engine.lendingPool.getReserve('FOT').totalCollateral).to.equal(99n * E18);
    expect(engine.ledger.balanceOf('FOT', LENDING_POOL_ACCOUNT)).to.equal(99n * E18);
  });
});
