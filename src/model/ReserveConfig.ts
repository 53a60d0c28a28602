/**
 * Risk parameters of one collateral asset
 */
export interface ReserveConfig {
  asset: string;
  decimals: number;
  maxLtvBps: number; // max debt/collateral value when opening debt
  liquidationThresholdBps: number; // below collateral * threshold >= debt the position is liquidatable
  liquidationBonusBps: number; // discount given to liquidators on seized collateral
  debtCeiling: bigint; // max total debt (debt asset raw units) issued against this collateral
  minDebt: bigint; // a position's debt is either 0 or at least this ("dust")
  debtAsset: string;
  borrowRatePerSecond: bigint; // ray, 1 ray = 0% interest
}

/**
 * Per-collateral accrual accumulator. actual debt = normalized debt * cumulativeRate / RAY
 */
export interface InterestIndex {
  cumulativeRate: bigint; // ray
  lastUpdate: number; // unix sec
}

export interface CollateralReserve {
  config: ReserveConfig;
  index: InterestIndex;
  totalCollateral: bigint;
  totalNormalizedDebt: bigint;
}

/**
 * Cash side of a borrowable asset, funded by lenders
 */
export interface LiquidityReserve {
  asset: string;
  decimals: number;
  cash: bigint;
  totalShares: bigint;
  shares: { [provider: string]: bigint };
  flashFeesCollected: bigint;
  badDebt: bigint;
}
