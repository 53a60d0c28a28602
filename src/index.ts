export * from './LendingEngine';
export * from './config/Config';
export * from './executor/StateCheckpointer';
export * from './executor/TransactionExecutor';
export * from './model/Asset';
export * from './model/AmmPool';
export * from './model/Auction';
export * from './model/Checkpoint';
export * from './model/Config';
export * from './model/EngineState';
export * from './model/ExecutionContext';
export * from './model/FlashLoan';
export * from './model/OracleFeed';
export * from './model/Position';
export * from './model/ReserveConfig';
export * from './model/Transaction';
export * from './model/Vault';
export * from './services/amm/AmmPool';
export * from './services/amm/AmmRegistry';
export * from './services/flashloan/FlashLoanCoordinator';
export * from './services/flashloan/strategies/LiquidationStrategy';
export * from './services/lending/LendingPool';
export * from './services/ledger/TokenLedger';
export * from './services/liquidation/LiquidationEngine';
export * from './services/liquidation/PriceDecay';
export * from './services/oracle/PriceOracle';
export * from './services/oracle/ReportedPriceFeed';
export * from './services/oracle/SequencerUptimeFeed';
export * from './services/oracle/TwapPriceSource';
export * from './services/oracle/VaultSharePriceFeed';
export * from './services/persistence/EngineStateStore';
export * from './services/vault/VaultAccounting';
export * from './services/vault/VaultRegistry';
export * from './utils/Errors';
export * from './utils/FixedPointMath';
export { norm, toRaw, ToBaseValue, FromBaseValue, Rescale, WadToBigNumber } from './utils/TokenUtils';
export { SerializeState, JsonBigIntReplacer, JsonBigIntReviver } from './utils/Utils';
export { WAD, RAY, BPS } from './utils/Constants';
