/**
 * Lending engine error classes
 *
 * Every recoverable failure of an operation is a `LendingEngineError` carrying an
 * `EngineErrorCode`. The transaction executor rolls the whole transaction back and hands the
 * error to the caller inside a failed `TransactionResult`, so callers can branch on the code:
 *
 * ```typescript
 * const res = engine.swapExactIn(ctx, 'pool-1', 'WETH', amountIn, minOut);
 * if (!res.success && res.error.code == EngineErrorCode.SlippageExceeded) {
 *   // retry with a smaller size or a lower minimum output
 * }
 * ```
 *
 * `InvariantViolationError` is deliberately outside this hierarchy: it signals a logic bug and
 * is re-thrown by the executor after rollback.
 */

export enum EngineErrorCode {
  // oracle
  OracleNoData = 'OracleNoData',
  OracleStale = 'OracleStale',
  OracleInvalidPrice = 'OracleInvalidPrice',
  ExecutionHalted = 'ExecutionHalted',
  OracleMismatch = 'OracleMismatch',
  // lending
  InsufficientCollateral = 'InsufficientCollateral',
  HealthFactorTooLow = 'HealthFactorTooLow',
  DebtCeilingExceeded = 'DebtCeilingExceeded',
  MinimumDebtViolation = 'MinimumDebtViolation',
  PositionHealthy = 'PositionHealthy',
  PositionInLiquidation = 'PositionInLiquidation',
  UnknownReserve = 'UnknownReserve',
  // amm
  SlippageExceeded = 'SlippageExceeded',
  InsufficientLiquidity = 'InsufficientLiquidity',
  UnknownPool = 'UnknownPool',
  // liquidation
  AuctionExpired = 'AuctionExpired',
  AuctionNotStarted = 'AuctionNotStarted',
  AuctionAlreadyActive = 'AuctionAlreadyActive',
  AuctionNotExpired = 'AuctionNotExpired',
  // flash loan
  RepaymentInsufficient = 'RepaymentInsufficient',
  UnknownStrategy = 'UnknownStrategy',
  InvalidStrategyParams = 'InvalidStrategyParams',
  // vault
  InflationGuardTriggered = 'InflationGuardTriggered',
  UnknownVault = 'UnknownVault',
  // generic
  Unauthorized = 'Unauthorized',
  InsufficientBalance = 'InsufficientBalance',
  InvalidAmount = 'InvalidAmount',
  Reentrancy = 'Reentrancy',
  ExecutionLocked = 'ExecutionLocked',
  InvalidExecutionContext = 'InvalidExecutionContext',
  Configuration = 'Configuration'
}

/**
 * Base error class for every recoverable engine error
 */
export abstract class LendingEngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ---- oracle -------------------------------------------------------------------------------

export class OracleNoDataError extends LendingEngineError {
  readonly code = EngineErrorCode.OracleNoData;
  constructor(asset: string, reason = 'no complete round') {
    super(`No oracle data for ${asset}: ${reason}`);
  }
}

export class OracleStaleError extends LendingEngineError {
  readonly code = EngineErrorCode.OracleStale;
  constructor(asset: string, readonly ageSec: number, readonly maxAgeSec: number) {
    super(`Oracle price for ${asset} is stale: ${ageSec}s old, must be under ${maxAgeSec}s`);
  }
}

export class OracleInvalidPriceError extends LendingEngineError {
  readonly code = EngineErrorCode.OracleInvalidPrice;
  constructor(asset: string, reason: string) {
    super(`Invalid oracle price for ${asset}: ${reason}`);
  }
}

export class ExecutionHaltedError extends LendingEngineError {
  readonly code = EngineErrorCode.ExecutionHalted;
  constructor(reason: string) {
    super(`Execution halted: ${reason}`);
  }
}

export class OracleMismatchError extends LendingEngineError {
  readonly code = EngineErrorCode.OracleMismatch;
  constructor(asset: string, readonly primary: bigint, readonly secondary: bigint, readonly deviationBps: bigint) {
    super(`Oracle sources disagree for ${asset}: primary ${primary} vs secondary ${secondary} (${deviationBps} bps)`);
  }
}

// ---- lending ------------------------------------------------------------------------------

export class InsufficientCollateralError extends LendingEngineError {
  readonly code = EngineErrorCode.InsufficientCollateral;
  constructor(message: string) {
    super(message);
  }
}

export class HealthFactorTooLowError extends LendingEngineError {
  readonly code = EngineErrorCode.HealthFactorTooLow;
  constructor(readonly healthFactorWad: bigint) {
    super(`Health factor would drop below 1: ${healthFactorWad} (wad)`);
  }
}

export class DebtCeilingExceededError extends LendingEngineError {
  readonly code = EngineErrorCode.DebtCeilingExceeded;
  constructor(asset: string, readonly totalDebt: bigint, readonly debtCeiling: bigint) {
    super(`Debt ceiling exceeded for ${asset}: ${totalDebt} > ${debtCeiling}`);
  }
}

export class MinimumDebtViolationError extends LendingEngineError {
  readonly code = EngineErrorCode.MinimumDebtViolation;
  constructor(asset: string, readonly debt: bigint, readonly minDebt: bigint) {
    super(`Debt for ${asset} would be ${debt}, below the minimum of ${minDebt}`);
  }
}

export class PositionHealthyError extends LendingEngineError {
  readonly code = EngineErrorCode.PositionHealthy;
  constructor(owner: string, asset: string) {
    super(`Position ${owner}/${asset} is healthy and cannot be liquidated`);
  }
}

export class PositionInLiquidationError extends LendingEngineError {
  readonly code = EngineErrorCode.PositionInLiquidation;
  constructor(owner: string, asset: string) {
    super(`Position ${owner}/${asset} is being liquidated`);
  }
}

export class UnknownReserveError extends LendingEngineError {
  readonly code = EngineErrorCode.UnknownReserve;
  constructor(asset: string) {
    super(`Unknown reserve: "${asset}"`);
  }
}

// ---- amm ----------------------------------------------------------------------------------

export class SlippageExceededError extends LendingEngineError {
  readonly code = EngineErrorCode.SlippageExceeded;
  constructor(message: string) {
    super(message);
  }
}

export class InsufficientLiquidityError extends LendingEngineError {
  readonly code = EngineErrorCode.InsufficientLiquidity;
  constructor(message: string) {
    super(message);
  }
}

export class UnknownPoolError extends LendingEngineError {
  readonly code = EngineErrorCode.UnknownPool;
  constructor(pool: string) {
    super(`Unknown pool: "${pool}"`);
  }
}

// ---- liquidation --------------------------------------------------------------------------

export class AuctionExpiredError extends LendingEngineError {
  readonly code = EngineErrorCode.AuctionExpired;
  constructor(positionKey: string) {
    super(`Auction for ${positionKey} expired and must be reset`);
  }
}

export class AuctionNotStartedError extends LendingEngineError {
  readonly code = EngineErrorCode.AuctionNotStarted;
  constructor(positionKey: string) {
    super(`No active auction for ${positionKey}`);
  }
}

export class AuctionAlreadyActiveError extends LendingEngineError {
  readonly code = EngineErrorCode.AuctionAlreadyActive;
  constructor(positionKey: string) {
    super(`An auction is already running for ${positionKey}`);
  }
}

export class AuctionNotExpiredError extends LendingEngineError {
  readonly code = EngineErrorCode.AuctionNotExpired;
  constructor(positionKey: string) {
    super(`Auction for ${positionKey} has not expired, reset refused`);
  }
}

// ---- flash loan ---------------------------------------------------------------------------

export class RepaymentInsufficientError extends LendingEngineError {
  readonly code = EngineErrorCode.RepaymentInsufficient;
  constructor(asset: string, readonly repaid: bigint, readonly required: bigint) {
    super(`Flash loan of ${asset} not repaid: received ${repaid}, required ${required}`);
  }
}

export class UnknownStrategyError extends LendingEngineError {
  readonly code = EngineErrorCode.UnknownStrategy;
  constructor(strategyId: string) {
    super(`Unknown flash loan strategy: "${strategyId}"`);
  }
}

export class InvalidStrategyParamsError extends LendingEngineError {
  readonly code = EngineErrorCode.InvalidStrategyParams;
  constructor(strategyId: string, reason: string) {
    super(`Invalid params for strategy ${strategyId}: ${reason}`);
  }
}

// ---- vault --------------------------------------------------------------------------------

export class InflationGuardTriggeredError extends LendingEngineError {
  readonly code = EngineErrorCode.InflationGuardTriggered;
  constructor(vaultId: string, readonly unaccounted: bigint) {
    super(`Vault ${vaultId} holds ${unaccounted} unaccounted assets, deposits halted`);
  }
}

export class UnknownVaultError extends LendingEngineError {
  readonly code = EngineErrorCode.UnknownVault;
  constructor(vaultId: string) {
    super(`Unknown vault: "${vaultId}"`);
  }
}

// ---- generic ------------------------------------------------------------------------------

export class UnauthorizedError extends LendingEngineError {
  readonly code = EngineErrorCode.Unauthorized;
  constructor(caller: string, action: string) {
    super(`${caller} is not allowed to ${action}`);
  }
}

export class InsufficientBalanceError extends LendingEngineError {
  readonly code = EngineErrorCode.InsufficientBalance;
  constructor(asset: string, account: string, readonly required: bigint, readonly available: bigint) {
    super(`Insufficient ${asset} balance for ${account}. Required: ${required}, Available: ${available}`);
  }
}

export class InvalidAmountError extends LendingEngineError {
  readonly code = EngineErrorCode.InvalidAmount;
  constructor(message: string) {
    super(`Invalid amount: ${message}`);
  }
}

export class ReentrancyError extends LendingEngineError {
  readonly code = EngineErrorCode.Reentrancy;
  constructor(component: string) {
    super(`Reentrant call into ${component}`);
  }
}

export class ExecutionLockedError extends LendingEngineError {
  readonly code = EngineErrorCode.ExecutionLocked;
  constructor(running: string) {
    super(`Transaction "${running}" is still executing`);
  }
}

export class InvalidExecutionContextError extends LendingEngineError {
  readonly code = EngineErrorCode.InvalidExecutionContext;
  constructor(message: string) {
    super(message);
  }
}

export class ConfigurationError extends LendingEngineError {
  readonly code = EngineErrorCode.Configuration;
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
  }
}

/**
 * A broken internal invariant (k decreasing, index going backwards, negative balance).
 * Never caught as a business error.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violation: ${message}`);
    this.name = 'InvariantViolationError';
  }
}
