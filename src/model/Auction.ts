export interface LiquidationAuction {
  id: number;
  positionKey: string;
  owner: string;
  collateralAsset: string;
  debtAsset: string;
  status: AuctionStatus;
  startPrice: bigint; // wad, debt units per collateral unit
  startTime: number; // unix sec
  decay: DecayConfig;
  maxDuration: number; // sec
  floorFractionBps: number;
  initialCollateral: bigint;
  initialDebt: bigint;
  remainingCollateral: bigint;
  remainingDebt: bigint;
  collateralSold: bigint;
  debtRecovered: bigint;
  badDebt: bigint;
  resets: number;
}

export enum AuctionStatus {
  NOT_STARTED = 'not_started',
  ACTIVE = 'active',
  SETTLED = 'settled',
  EXPIRED = 'expired'
}

export type DecayConfig = LinearDecayConfig | StairstepDecayConfig | ExponentialDecayConfig;

export interface LinearDecayConfig {
  kind: 'linear';
  duration: number; // sec until the price reaches zero
}

export interface StairstepDecayConfig {
  kind: 'stairstep';
  step: number; // sec between price cuts
  cut: bigint; // ray, multiplier applied at each step
}

export interface ExponentialDecayConfig {
  kind: 'exponential';
  cut: bigint; // ray, multiplier applied every second
}

export interface AuctionConfig {
  bufferMultiplierBps: number; // start price = oracle price * buffer
  decay: DecayConfig;
  maxDuration: number;
  floorFractionBps: number; // below startPrice * floor the auction needs a reset
}

export interface TakeParams {
  maxCollateral: bigint;
  maxPrice: bigint; // wad
  recipient?: string;
}

export interface TakeResult {
  auctionId: number;
  collateralSeized: bigint;
  debtRepaid: bigint;
  price: bigint;
  status: AuctionStatus;
}

export interface LiquidationEngineState {
  nextAuctionId: number;
  auctions: { [positionKey: string]: LiquidationAuction };
}
