export interface AssetConfig {
  id: string;
  symbol: string;
  decimals: number;
  transferFeeBps?: number; // fee-on-transfer tokens burn this share of every transfer
}
