import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { ExecutionLivenessFeed, SequencerState } from '../../model/OracleFeed';
import { RequireCaller } from '../../utils/AccessControl';
import { Log, Warn } from '../../utils/Logger';
import { DeepCopy } from '../../utils/Utils';

export class SequencerUptimeFeed implements ExecutionLivenessFeed, Checkpointable<SequencerState> {
  private state: SequencerState = { live: true, changedAt: 0 };

  constructor(private readonly reporters: string[]) {}

  isExecutionLive(): boolean {
    return this.state.live;
  }

  liveSince(): number {
    return this.state.changedAt;
  }

  reportStatus(ctx: ExecutionContext, live: boolean) {
    RequireCaller(ctx, this.reporters, 'report the execution status');
    if (this.state.live == live) {
      return;
    }

    this.state = { live, changedAt: ctx.timestamp };
    if (live) {
      Log(`SequencerUptimeFeed: execution back up at ${ctx.timestamp}`);
    } else {
      Warn(`SequencerUptimeFeed: execution down at ${ctx.timestamp}`);
    }
  }

  snapshot(): SequencerState {
    return DeepCopy(this.state);
  }

  restore(state: SequencerState) {
    this.state = DeepCopy(state);
  }
}
