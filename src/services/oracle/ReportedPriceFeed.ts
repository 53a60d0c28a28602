import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { PrimaryPriceFeed, ReportedFeedState, RoundData } from '../../model/OracleFeed';
import { RequireCaller } from '../../utils/AccessControl';
import { Debug } from '../../utils/Logger';
import { DeepCopy } from '../../utils/Utils';

/**
 * Push feed: privileged reporters write rounds, the oracle reads the latest one.
 */
export class ReportedPriceFeed implements PrimaryPriceFeed, Checkpointable<ReportedFeedState> {
  readonly version = 'reported-feed-v1';
  private state: ReportedFeedState;

  constructor(reporters: string[]) {
    this.state = { rounds: {}, reporters: [...reporters] };
  }

  latestRoundData(asset: string): RoundData | undefined {
    const round = this.state.rounds[asset];
    return round ? { ...round } : undefined;
  }

  /**
   * Open and answer a new round. `updatedAt` defaults to the transaction time.
   */
  reportPrice(ctx: ExecutionContext, asset: string, answer: bigint, updatedAt = ctx.timestamp): RoundData {
    RequireCaller(ctx, this.state.reporters, `report a price for ${asset}`);

    const previous = this.state.rounds[asset];
    const roundId = previous ? previous.roundId + 1n : 1n;
    const round: RoundData = {
      roundId,
      answer,
      startedAt: updatedAt,
      updatedAt,
      answeredInRound: roundId
    };

    this.state.rounds[asset] = round;
    Debug(`ReportedPriceFeed: ${asset} round ${roundId} answer ${answer} at ${updatedAt}`);
    return { ...round };
  }

  /**
   * Write a raw round as the reporter saw it, incomplete rounds included.
   */
  reportRound(ctx: ExecutionContext, asset: string, round: RoundData) {
    RequireCaller(ctx, this.state.reporters, `report a round for ${asset}`);
    this.state.rounds[asset] = { ...round };
  }

  snapshot(): ReportedFeedState {
    return DeepCopy(this.state);
  }

  restore(state: ReportedFeedState) {
    this.state = DeepCopy(state);
  }
}
