import { Checkpointable } from '../model/Checkpoint';
import { ExecutorState } from '../model/EngineState';
import { ExecutionContext } from '../model/ExecutionContext';
import { TransactionResult } from '../model/Transaction';
import { ExecutionLockedError, InvalidExecutionContextError, LendingEngineError } from '../utils/Errors';
import { Debug, Err, Warn } from '../utils/Logger';
import { StateCheckpointer } from './StateCheckpointer';

/**
 * Runs one operation at a time, all or nothing.
 *
 * A checkpoint of every registered component is taken before the operation. Business errors
 * (LendingEngineError) restore it and come back as a failed result; anything else restores it
 * and is re-thrown.
 */
export class TransactionExecutor implements Checkpointable<ExecutorState> {
  private state: ExecutorState = { txCount: 0, lastTimestamp: 0 };
  private running?: string;

  constructor(private readonly checkpointer: StateCheckpointer) {}

  get isRunning(): boolean {
    return this.running != undefined;
  }

  get lastTimestamp(): number {
    return this.state.lastTimestamp;
  }

  execute<T>(ctx: ExecutionContext, label: string, operation: () => T): TransactionResult<T> {
    if (this.running != undefined) {
      return { success: false, txIndex: this.state.txCount, error: new ExecutionLockedError(this.running) };
    }

    const contextError = this.validateContext(ctx);
    if (contextError) {
      Warn(`TransactionExecutor: rejected ${label}: ${contextError.message}`);
      return { success: false, txIndex: this.state.txCount, error: contextError };
    }

    const txIndex = this.state.txCount++;
    this.state.lastTimestamp = ctx.timestamp;
    this.running = label;
    const checkpoint = this.checkpointer.capture();
    try {
      const value = operation();
      Debug(`TransactionExecutor: tx ${txIndex} ${label} by ${ctx.callerId} succeeded`);
      return { success: true, txIndex, value };
    } catch (e) {
      this.checkpointer.restore(checkpoint);
      if (e instanceof LendingEngineError) {
        Warn(`TransactionExecutor: tx ${txIndex} ${label} by ${ctx.callerId} rolled back: [${e.code}] ${e.message}`);
        return { success: false, txIndex, error: e };
      }

      Err(`TransactionExecutor: tx ${txIndex} ${label} rolled back on fatal error`, e);
      throw e;
    } finally {
      this.running = undefined;
    }
  }

  snapshot(): ExecutorState {
    return { ...this.state };
  }

  restore(state: ExecutorState) {
    this.state = { ...state };
  }

  private validateContext(ctx: ExecutionContext): InvalidExecutionContextError | undefined {
    if (!ctx.callerId) {
      return new InvalidExecutionContextError('execution context has no caller');
    }
    if (!Number.isInteger(ctx.timestamp) || ctx.timestamp < 0) {
      return new InvalidExecutionContextError(`invalid timestamp ${ctx.timestamp}`);
    }
    if (ctx.timestamp < this.state.lastTimestamp) {
      return new InvalidExecutionContextError(
        `timestamp ${ctx.timestamp} is before the last executed transaction (${this.state.lastTimestamp})`
      );
    }
    return undefined;
  }
}
