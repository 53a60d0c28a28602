import { expect } from 'chai';
import { LendingEngine } from '../../src/LendingEngine';
import { AuctionConfig } from '../../src/model/Auction';
import { ExecutionContext, NewContext } from '../../src/model/ExecutionContext';
import { ReserveConfig } from '../../src/model/ReserveConfig';
import { TransactionResult } from '../../src/model/Transaction';
import { RAY } from '../../src/utils/Constants';
import { EngineErrorCode, LendingEngineError } from '../../src/utils/Errors';

export const T0 = 1_700_000_000;
export const ADMIN = 'admin';
export const REPORTER = 'price-reporter';
export const LP = 'lender';
export const ALICE = 'alice';
export const BOB = 'bob';
export const KEEPER = 'keeper';

export const E18 = 10n ** 18n;
export const E8 = 10n ** 8n;
export const E6 = 10n ** 6n;

export function Ctx(callerId: string, timestamp: number): ExecutionContext {
  return NewContext(callerId, timestamp);
}

export const DEFAULT_AUCTION: AuctionConfig = {
  bufferMultiplierBps: 11_000,
  decay: { kind: 'linear', duration: 7200 },
  maxDuration: 3600,
  floorFractionBps: 4000
};

export const WETH_RESERVE: ReserveConfig = {
  asset: 'WETH',
  decimals: 18,
  maxLtvBps: 8000,
  liquidationThresholdBps: 8250,
  liquidationBonusBps: 500,
  debtCeiling: 10_000_000n * E6,
  minDebt: 100n * E6,
  debtAsset: 'USDC',
  borrowRatePerSecond: RAY
};

export interface TestEngineOptions {
  auction?: AuctionConfig;
  reserve?: Partial<ReserveConfig>;
  liquidity?: bigint;
  flashFeeBps?: number;
  sequencerGracePeriod?: number;
}

/**
 * WETH (18 dec) collateral borrowing USDC (6 dec), both priced at T0 (3000 / 1 on 8 decimal feeds),
 * 1M USDC of lender liquidity.
 */
export function CreateTestEngine(options: TestEngineOptions = {}): LendingEngine {
  const engine = new LendingEngine({
    admins: [ADMIN],
    priceReporters: [REPORTER],
    auction: options.auction ?? DEFAULT_AUCTION,
    flashLoan: { feeBps: options.flashFeeBps ?? 9 },
    sequencerGracePeriod: options.sequencerGracePeriod
  });
  const admin = Ctx(ADMIN, T0);

  ExpectSuccess(engine.registerAsset(admin, { id: 'WETH', symbol: 'WETH', decimals: 18 }));
  ExpectSuccess(engine.registerAsset(admin, { id: 'USDC', symbol: 'USDC', decimals: 6 }));
  engine.configureFeed(admin, { asset: 'WETH', decimals: 8, heartbeat: 3600, maxStalenessBuffer: 300, deviationThresholdBps: 500 });
  engine.configureFeed(admin, { asset: 'USDC', decimals: 8, heartbeat: 86400, maxStalenessBuffer: 3600, deviationThresholdBps: 200 });
  ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'WETH', 3000n * E8));
  ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'USDC', 1n * E8));

  ExpectSuccess(engine.listDebtAsset(admin, 'USDC'));
  ExpectSuccess(engine.configureReserve(admin, { ...WETH_RESERVE, ...options.reserve }));

  const liquidity = options.liquidity ?? 1_000_000n * E6;
  engine.ledger.mint('USDC', LP, liquidity);
  ExpectSuccess(engine.provideLiquidity(Ctx(LP, T0), 'USDC', liquidity));
  return engine;
}

export function ExpectSuccess<T>(result: TransactionResult<T>): T {
  if (!result.success) {
    throw new Error(`expected success, got [${result.error.code}] ${result.error.message}`);
  }
  return result.value;
}

export function ExpectFailure<T>(result: TransactionResult<T>, code: EngineErrorCode): LendingEngineError {
  if (result.success) {
    throw new Error(`expected ${code}, transaction succeeded`);
  }
  expect(result.error.code).to.equal(code);
  return result.error;
}

export function ExpectThrowsCode(fn: () => unknown, code: EngineErrorCode): LendingEngineError {
  try {
    fn();
  } catch (e) {
    expect(e).to.be.instanceOf(LendingEngineError);
    if (e instanceof LendingEngineError) {
      expect(e.code).to.equal(code);
      return e;
    }
    throw e;
  }
  throw new Error(`expected ${code}, nothing was thrown`);
}
