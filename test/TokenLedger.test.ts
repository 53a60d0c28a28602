import { expect } from 'chai';
import { TokenLedger } from '../src/services/ledger/TokenLedger';
import { EngineErrorCode } from '../src/utils/Errors';
import { ExpectThrowsCode } from './helpers/Fixtures';

describe('TokenLedger', function () {
  let ledger: TokenLedger;

  beforeEach(function () {
    ledger = new TokenLedger();
    ledger.registerAsset({ id: 'TKN', symbol: 'TKN', decimals: 18 });
    ledger.registerAsset({ id: 'FOT', symbol: 'FOT', decimals: 18, transferFeeBps: 100 });
  });

  it('moves balances', function () {
    ledger.mint('TKN', 'alice', 100n);
    ledger.transfer('TKN', 'alice', 'bob', 40n);
    expect(ledger.balanceOf('TKN', 'alice')).to.equal(60n);
    expect(ledger.balanceOf('TKN', 'bob')).to.equal(40n);
    expect(ledger.totalSupply('TKN')).to.equal(100n);
  });

  it('rejects transfers above the balance', function () {
    ledger.mint('TKN', 'alice', 10n);
    const error = ExpectThrowsCode(() => ledger.transfer('TKN', 'alice', 'bob', 11n), EngineErrorCode.InsufficientBalance);
    expect(error.message).to.equal('Insufficient TKN balance for alice. Required: 11, Available: 10');
  });

  it('measures what a fee-on-transfer token delivers', function () {
    ledger.mint('FOT', 'alice', 1000n);
    const received = ledger.transferAndMeasure('FOT', 'alice', 'pool', 1000n);
    expect(received).to.equal(990n);
    expect(ledger.balanceOf('FOT', 'alice')).to.equal(0n);
    expect(ledger.totalSupply('FOT')).to.equal(990n);
  });

  it('refuses duplicate and unknown assets', function () {
    ExpectThrowsCode(() => ledger.registerAsset({ id: 'TKN', symbol: 'TKN', decimals: 6 }), EngineErrorCode.Configuration);
    ExpectThrowsCode(() => ledger.balanceOf('NOPE', 'alice'), EngineErrorCode.Configuration);
  });

  it('calls the transfer hook with the received amount', function () {
    const calls: string[] = [];
    ledger.setTransferHook('FOT', (asset, from, to, received) => calls.push(`${asset}:${from}->${to}:${received}`));
    ledger.mint('FOT', 'alice', 500n);
    ledger.transfer('FOT', 'alice', 'bob', 500n);
    expect(calls).to.deep.equal(['FOT:alice->bob:495']);
  });

  it('restores a snapshot and keeps it isolated', function () {
    ledger.mint('TKN', 'alice', 100n);
    const snapshot = ledger.snapshot();
    ledger.transfer('TKN', 'alice', 'bob', 100n);
    snapshot.balances['TKN']['mallory'] = 1n;
    ledger.restore(snapshot);
    delete snapshot.balances['TKN']['alice'];

    expect(ledger.balanceOf('TKN', 'alice')).to.equal(100n);
    expect(ledger.balanceOf('TKN', 'bob')).to.equal(0n);
    expect(ledger.balanceOf('TKN', 'mallory')).to.equal(1n);
  });
});
