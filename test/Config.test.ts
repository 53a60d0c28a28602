import { expect } from 'chai';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CreateEngineFromConfig, LoadEngineConfig, ValidateEngineConfig } from '../src/config/Config';
import { EngineConfig } from '../src/model/Config';
import { LoadEngineState, SaveEngineState } from '../src/services/persistence/EngineStateStore';
import { EngineErrorCode } from '../src/utils/Errors';
import { DeepCopy } from '../src/utils/Utils';
import { Ctx, E18, E6, E8, ExpectSuccess, ExpectThrowsCode, T0 } from './helpers/Fixtures';

const CONFIG_FILE = path.join(__dirname, '..', 'params', 'engine-config.json');
const REPORTER = 'price-reporter';

describe('Config', function () {
  let config: EngineConfig;

  beforeEach(function () {
    config = LoadEngineConfig(CONFIG_FILE);
  });

  it('reads bigints written as strings', function () {
    expect(config.reserves[0].debtCeiling).to.equal(10_000_000n * E6);
    expect(config.auction.decay).to.deep.equal({ kind: 'stairstep', step: 90, cut: 990000000000000000000000000n });
    expect(config.vaults[0].virtualShares).to.equal(1000n);
  });

  it('builds a ready engine', function () {
    const engine = CreateEngineFromConfig(config, T0);

    expect(engine.ledger.decimalsOf('vWETH')).to.equal(21);
    expect(engine.lendingPool.getReserveConfig('WBTC').liquidationBonusBps).to.equal(800);
    expect(engine.getPool('weth-usdc').assets).to.deep.equal(['WETH', 'USDC']);

    ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'WETH', 3_000n * E8));
    expect(engine.getPrice(Ctx(REPORTER, T0 + 10), 'vWETH').price).to.equal(3_000n * E8);
  });

  it('rejects inconsistent configurations', function () {
    const unlisted = DeepCopy(config);
    unlisted.reserves[0].debtAsset = 'DAI';
    const error = ExpectThrowsCode(() => ValidateEngineConfig(unlisted), EngineErrorCode.Configuration);
    expect(error.message).to.equal('Invalid configuration: reserve WETH borrows unlisted DAI');

    const noAdmin = DeepCopy(config);
    noAdmin.admins = [];
    ExpectThrowsCode(() => ValidateEngineConfig(noAdmin), EngineErrorCode.Configuration);

    const unknownPool = DeepCopy(config);
    unknownPool.pools = [];
    ExpectThrowsCode(() => ValidateEngineConfig(unknownPool), EngineErrorCode.Configuration);
  });

  describe('engine state', function () {
    let dir: string;

    beforeEach(function () {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-state-'));
    });

    afterEach(function () {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('survives a save and a load', function () {
      const engine = CreateEngineFromConfig(config, T0);
      ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'WETH', 3_000n * E8));
      ExpectSuccess(engine.reportPrice(Ctx(REPORTER, T0), 'USDC', E8));
      engine.ledger.mint('USDC', 'lender', 100_000n * E6);
      ExpectSuccess(engine.provideLiquidity(Ctx('lender', T0), 'USDC', 100_000n * E6));
      engine.ledger.mint('WETH', 'alice', 2n * E18);
      ExpectSuccess(engine.supply(Ctx('alice', T0 + 10), 'WETH', 2n * E18));
      ExpectSuccess(engine.borrow(Ctx('alice', T0 + 10), 'WETH', 1_000n * E6));

      const file = path.join(dir, 'state.json');
      SaveEngineState(engine, file);

      const restored = CreateEngineFromConfig(config, T0);
      expect(LoadEngineState(restored, file)).to.equal(true);
      expect(restored.fingerprint()).to.equal(engine.fingerprint());
      expect(restored.executor.snapshot()).to.deep.equal(engine.executor.snapshot());
      expect(restored.getPosition(Ctx('alice', T0 + 10), 'alice', 'WETH')?.debt).to.equal(1_000n * E6);
    });

    it('reports a missing file and rejects a foreign one', function () {
      const engine = CreateEngineFromConfig(config, T0);
      expect(LoadEngineState(engine, path.join(dir, 'missing.json'))).to.equal(false);

      const foreign = path.join(dir, 'foreign.json');
      fs.writeFileSync(foreign, JSON.stringify({ hello: 'world' }));
      ExpectThrowsCode(() => LoadEngineState(engine, foreign), EngineErrorCode.Configuration);
    });
  });
});
