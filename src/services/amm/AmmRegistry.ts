import { AmmPoolConfig, AmmPoolState } from '../../model/AmmPool';
import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { RequireCaller } from '../../utils/AccessControl';
import { BPS, DEFAULT_OBSERVATION_CARDINALITY } from '../../utils/Constants';
import { ConfigurationError, UnknownPoolError } from '../../utils/Errors';
import { Log } from '../../utils/Logger';
import { TokenLedger } from '../ledger/TokenLedger';
import { AmmPool } from './AmmPool';

export class AmmRegistry implements Checkpointable<{ [poolId: string]: AmmPoolState }> {
  private pools = new Map<string, AmmPool>();

  constructor(
    private readonly ledger: TokenLedger,
    private readonly admins: string[]
  ) {}

  createPool(ctx: ExecutionContext, config: AmmPoolConfig): AmmPool {
    RequireCaller(ctx, this.admins, 'create a pool');
    if (this.pools.has(config.id)) {
      throw new ConfigurationError(`pool ${config.id} already exists`);
    }
    if (config.assetA == config.assetB) {
      throw new ConfigurationError(`pool ${config.id} needs two different assets`);
    }
    if (config.feeBps < 0 || config.feeBps >= Number(BPS)) {
      throw new ConfigurationError(`pool ${config.id} has invalid fee ${config.feeBps}`);
    }
    if (this.findPool(config.assetA, config.assetB)) {
      throw new ConfigurationError(`a pool for ${config.assetA}/${config.assetB} already exists`);
    }
    // both assets must be registered
    this.ledger.getAsset(config.assetA);
    this.ledger.getAsset(config.assetB);

    const cardinality = config.observationCardinality ?? DEFAULT_OBSERVATION_CARDINALITY;
    if (!Number.isInteger(cardinality) || cardinality < 1) {
      throw new ConfigurationError(`pool ${config.id} has invalid observation cardinality ${cardinality}`);
    }

    const pool = new AmmPool(this.ledger, {
      id: config.id,
      assetA: config.assetA,
      assetB: config.assetB,
      feeBps: config.feeBps,
      reserveA: 0n,
      reserveB: 0n,
      totalShares: 0n,
      shares: {},
      priceACumulative: 0n,
      priceBCumulative: 0n,
      lastUpdate: 0,
      observationCardinality: cardinality,
      observations: []
    });
    this.pools.set(config.id, pool);

    Log(`AmmRegistry: created pool ${config.id} ${config.assetA}/${config.assetB} fee ${config.feeBps} bps`);
    return pool;
  }

  getPool(poolId: string): AmmPool {
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new UnknownPoolError(poolId);
    }
    return pool;
  }

  findPool(assetX: string, assetY: string): AmmPool | undefined {
    for (const pool of this.pools.values()) {
      const [a, b] = pool.assets;
      if ((a == assetX && b == assetY) || (a == assetY && b == assetX)) {
        return pool;
      }
    }
    return undefined;
  }

  getPoolIds(): string[] {
    return Array.from(this.pools.keys());
  }

  snapshot(): { [poolId: string]: AmmPoolState } {
    const states: { [poolId: string]: AmmPoolState } = {};
    for (const [poolId, pool] of this.pools) {
      states[poolId] = pool.snapshot();
    }
    return states;
  }

  // existing pool objects are restored in place so references held elsewhere stay valid
  restore(states: { [poolId: string]: AmmPoolState }) {
    for (const poolId of Array.from(this.pools.keys())) {
      if (!states[poolId]) {
        this.pools.delete(poolId);
      }
    }
    for (const [poolId, state] of Object.entries(states)) {
      const pool = this.pools.get(poolId);
      if (pool) {
        pool.restore(state);
      } else {
        this.pools.set(poolId, new AmmPool(this.ledger, state));
      }
    }
  }
}
