import { expect } from 'chai';
import { RAY, WAD } from '../src/utils/Constants';
import { InvariantViolationError } from '../src/utils/Errors';
import { bpsMul, checkedSub, mulDiv, Rounding, rpow, sqrt } from '../src/utils/FixedPointMath';
import { FromBaseValue, norm, Rescale, toRaw, ToBaseValue, WadToBigNumber } from '../src/utils/TokenUtils';
import { JsonBigIntReviver, SerializeState } from '../src/utils/Utils';

describe('FixedPointMath', function () {
  it('mulDiv rounds down by default and up on request', function () {
    expect(mulDiv(7n, 3n, 2n)).to.equal(10n);
    expect(mulDiv(7n, 3n, 2n, Rounding.UP)).to.equal(11n);
    expect(mulDiv(6n, 3n, 2n, Rounding.UP)).to.equal(9n);
  });

  it('mulDiv refuses a zero denominator', function () {
    expect(() => mulDiv(1n, 1n, 0n)).to.throw(InvariantViolationError);
  });

  it('rpow follows exponentiation by squaring', function () {
    expect(rpow(RAY, 1000, RAY)).to.equal(RAY);
    expect(rpow(2n * RAY, 10, RAY)).to.equal(1024n * RAY);
    expect(rpow(5n * RAY, 0, RAY)).to.equal(RAY);
    expect(rpow(0n, 0, RAY)).to.equal(RAY);
    expect(rpow(0n, 5, RAY)).to.equal(0n);
    expect(rpow(99n * 10n ** 25n, 2, RAY)).to.equal(9801n * 10n ** 23n);
  });

  it('sqrt floors', function () {
    expect(sqrt(1_000_000n)).to.equal(1000n);
    expect(sqrt(99n)).to.equal(9n);
    expect(sqrt(0n)).to.equal(0n);
    expect(sqrt(1n)).to.equal(1n);
  });

  it('bpsMul', function () {
    expect(bpsMul(10_000n, 30)).to.equal(30n);
    expect(bpsMul(1n, 9)).to.equal(0n);
    expect(bpsMul(1n, 9, Rounding.UP)).to.equal(1n);
  });

  it('checkedSub throws instead of going negative', function () {
    expect(checkedSub(5n, 2n, 'x')).to.equal(3n);
    expect(() => checkedSub(1n, 2n, 'balance')).to.throw(InvariantViolationError);
  });
});

describe('TokenUtils', function () {
  it('ToBaseValue normalizes asset and feed decimals to wad', function () {
    expect(ToBaseValue(2n * WAD, 18, 3000n * 10n ** 8n, 8)).to.equal(6000n * WAD);
    expect(ToBaseValue(3000n * 10n ** 6n, 6, 10n ** 8n, 8)).to.equal(3000n * WAD);
    expect(ToBaseValue(1n, 18, 1n, 8)).to.equal(0n);
    expect(ToBaseValue(1n, 18, 1n, 8, Rounding.UP)).to.equal(1n);
  });

  it('FromBaseValue inverts ToBaseValue', function () {
    expect(FromBaseValue(6000n * WAD, 18, 3000n * 10n ** 8n, 8)).to.equal(2n * WAD);
  });

  it('Rescale', function () {
    expect(Rescale(123_456_789n, 8, 6)).to.equal(1_234_567n);
    expect(Rescale(123_456_789n, 8, 6, Rounding.UP)).to.equal(1_234_568n);
    expect(Rescale(5n, 6, 8)).to.equal(500n);
  });

  it('norm and toRaw use the token decimals', function () {
    expect(norm(1_500_000n, 6)).to.equal(1.5);
    expect(toRaw('1.944', 18)).to.equal(1_944_000_000_000_000_000n);
  });

  it('WadToBigNumber', function () {
    expect(WadToBigNumber(1_650_000_000_000_000_000n).toString()).to.equal('1.65');
  });
});

describe('Utils', function () {
  it('serializes bigints, negative ones included, and revives them', function () {
    const serialized = SerializeState({ a: 5n, b: -3n, c: 'x' });
    expect(serialized).to.equal('{"a":"5n","b":"-3n","c":"x"}');
    expect(JSON.parse(serialized, JsonBigIntReviver)).to.deep.equal({ a: 5n, b: -3n, c: 'x' });
  });
});
