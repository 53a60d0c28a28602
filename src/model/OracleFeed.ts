import { ExecutionContext } from './ExecutionContext';

export interface FeedConfig {
  asset: string;
  decimals: number;
  heartbeat: number; // sec
  maxStalenessBuffer: number; // sec, tolerated on top of the heartbeat
  deviationThresholdBps: number; // max primary/secondary disagreement
}

export interface RoundData {
  roundId: bigint;
  answer: bigint; // signed, as reported
  startedAt: number;
  updatedAt: number;
  answeredInRound: bigint;
}

export interface PriceReading {
  asset: string;
  price: bigint;
  updatedAt: number;
  decimals: number;
  source: PriceSourceEnum;
}

export enum PriceSourceEnum {
  PRIMARY = 'primary',
  SECONDARY = 'secondary'
}

/**
 * Primary price feed, swappable at configuration time.
 * `version` identifies the implementation behind the interface.
 */
export interface PrimaryPriceFeed {
  readonly version: string;
  latestRoundData(asset: string, ctx: ExecutionContext): RoundData | undefined;
}

/**
 * Fallback source consulted when the primary feed cannot be used.
 * Throws an oracle error when it has nothing usable.
 */
export interface SecondaryPriceSource {
  readonly name: string;
  read(ctx: ExecutionContext, asset: string, decimals: number): PriceReading;
}

export interface ExecutionLivenessFeed {
  isExecutionLive(): boolean;
  liveSince(): number; // unix sec of the last transition to live
}

export interface ReportedFeedState {
  rounds: { [asset: string]: RoundData };
  reporters: string[];
}

export interface SequencerState {
  live: boolean;
  changedAt: number;
}
