export interface Position {
  owner: string;
  asset: string; // collateral asset
  collateralAmount: bigint;
  normalizedDebt: bigint;
  inLiquidation: boolean;
}

export interface PositionView extends Position {
  debt: bigint; // normalizedDebt at the current index
  debtAsset: string;
}

export interface SeizedCollateral {
  auctionId: number;
  collateralSeized: bigint;
  debtRepaid: bigint;
  price: bigint; // wad, debt units per collateral unit
}

export function GetPositionKey(owner: string, asset: string): string {
  return `${owner}|${asset}`;
}
