export interface AmmPoolConfig {
  id: string;
  assetA: string;
  assetB: string;
  feeBps: number;
  observationCardinality?: number;
}

export interface AmmObservation {
  timestamp: number;
  priceACumulative: bigint; // sum of (reserveB/reserveA in wad) * seconds, raw units
  priceBCumulative: bigint;
}

export interface AmmPoolState {
  id: string;
  assetA: string;
  assetB: string;
  feeBps: number;
  reserveA: bigint;
  reserveB: bigint;
  totalShares: bigint;
  shares: { [provider: string]: bigint };
  priceACumulative: bigint;
  priceBCumulative: bigint;
  lastUpdate: number;
  observationCardinality: number;
  observations: AmmObservation[];
}

export interface SwapResult {
  poolId: string;
  assetIn: string;
  assetOut: string;
  amountIn: bigint;
  amountOut: bigint;
}

export interface LiquidityResult {
  amountA: bigint;
  amountB: bigint;
  shares: bigint;
}
