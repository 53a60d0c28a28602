import { expect } from 'chai';
import { StateCheckpointer } from '../src/executor/StateCheckpointer';
import { TransactionExecutor } from '../src/executor/TransactionExecutor';
import { Checkpointable } from '../src/model/Checkpoint';
import { EngineErrorCode, InvalidAmountError, InvariantViolationError } from '../src/utils/Errors';
import { Ctx, ExpectFailure, ExpectSuccess, T0 } from './helpers/Fixtures';

interface CounterState {
  value: bigint;
  history: string[];
}

class Counter implements Checkpointable<CounterState> {
  state: CounterState = { value: 0n, history: [] };

  add(amount: bigint, label: string) {
    this.state.value += amount;
    this.state.history.push(label);
  }

  snapshot(): CounterState {
    return { value: this.state.value, history: [...this.state.history] };
  }

  restore(state: CounterState) {
    this.state = { value: state.value, history: [...state.history] };
  }
}

describe('TransactionExecutor', function () {
  let first: Counter;
  let second: Counter;
  let checkpointer: StateCheckpointer;
  let executor: TransactionExecutor;

  beforeEach(function () {
    first = new Counter();
    second = new Counter();
    checkpointer = new StateCheckpointer();
    checkpointer.register('first', first);
    checkpointer.register('second', second);
    executor = new TransactionExecutor(checkpointer);
  });

  it('applies a successful operation and numbers transactions', function () {
    const result = executor.execute(Ctx('alice', T0), 'add', () => {
      first.add(5n, 'a');
      return first.state.value;
    });
    expect(result).to.deep.equal({ success: true, txIndex: 0, value: 5n });

    const next = executor.execute(Ctx('alice', T0), 'add', () => second.add(1n, 'b'));
    expect(next.txIndex).to.equal(1);
    expect(executor.snapshot()).to.deep.equal({ txCount: 2, lastTimestamp: T0 });
  });

  it('rolls back every component on a business error', function () {
    ExpectSuccess(executor.execute(Ctx('alice', T0), 'seed', () => first.add(1n, 'seed')));
    const before = checkpointer.fingerprint();

    const error = ExpectFailure(
      executor.execute(Ctx('alice', T0 + 1), 'fail', () => {
        first.add(10n, 'x');
        second.add(20n, 'y');
        throw new InvalidAmountError('late failure');
      }),
      EngineErrorCode.InvalidAmount
    );
    expect(error.message).to.equal('Invalid amount: late failure');
    expect(checkpointer.fingerprint()).to.equal(before);
    expect(first.state).to.deep.equal({ value: 1n, history: ['seed'] });
    expect(second.state).to.deep.equal({ value: 0n, history: [] });
    expect(executor.snapshot()).to.deep.equal({ txCount: 2, lastTimestamp: T0 + 1 });
  });

  it('rolls back and re-throws anything else', function () {
    expect(() =>
      executor.execute(Ctx('alice', T0), 'bug', () => {
        first.add(3n, 'bug');
        throw new InvariantViolationError('k decreased');
      })
    ).to.throw(InvariantViolationError, 'Invariant violation: k decreased');
    expect(first.state.value).to.equal(0n);
    expect(executor.isRunning).to.equal(false);
  });

  it('refuses to start a transaction inside another one', function () {
    const outer = executor.execute(Ctx('alice', T0), 'outer', () => {
      first.add(1n, 'outer');
      return executor.execute(Ctx('alice', T0), 'inner', () => second.add(1n, 'inner'));
    });

    const inner = ExpectSuccess(outer);
    const error = ExpectFailure(inner, EngineErrorCode.ExecutionLocked);
    expect(error.message).to.equal('Transaction "outer" is still executing');
    expect(first.state.value).to.equal(1n);
    expect(second.state.value).to.equal(0n);
  });

  it('validates the execution context', function () {
    ExpectSuccess(executor.execute(Ctx('alice', T0), 'first', () => undefined));

    ExpectFailure(executor.execute(Ctx('', T0), 'anonymous', () => undefined), EngineErrorCode.InvalidExecutionContext);
    ExpectFailure(executor.execute(Ctx('alice', T0 + 0.5), 'fractional', () => undefined), EngineErrorCode.InvalidExecutionContext);
    const error = ExpectFailure(
      executor.execute(Ctx('alice', T0 - 1), 'past', () => undefined),
      EngineErrorCode.InvalidExecutionContext
    );
    expect(error.message).to.equal(`timestamp ${T0 - 1} is before the last executed transaction (${T0})`);
    expect(executor.snapshot().txCount).to.equal(1);
  });
});

describe('StateCheckpointer', function () {
  it('refuses duplicate component names', function () {
    const checkpointer = new StateCheckpointer();
    checkpointer.register('counter', new Counter());
    expect(() => checkpointer.register('counter', new Counter())).to.throw(InvariantViolationError);
    expect(checkpointer.getComponentNames()).to.deep.equal(['counter']);
  });

  it('restores a captured checkpoint', function () {
    const counter = new Counter();
    const checkpointer = new StateCheckpointer();
    checkpointer.register('counter', counter);

    counter.add(7n, 'seven');
    const checkpoint = checkpointer.capture();
    counter.add(1n, 'one');
    expect(checkpointer.fingerprint()).to.equal('{"counter":{"value":"8n","history":["seven","one"]}}');

    checkpointer.restore(checkpoint);
    expect(counter.state).to.deep.equal({ value: 7n, history: ['seven'] });
  });
});
