import { EngineConfig } from '../model/Config';
import { NewContext } from '../model/ExecutionContext';
import { TransactionResult } from '../model/Transaction';
import { LendingEngine } from '../LendingEngine';
import { ENGINE_CONFIG_FILE } from '../utils/Constants';
import { ConfigurationError } from '../utils/Errors';
import { Log } from '../utils/Logger';
import { ReadJSON } from '../utils/Utils';

/**
 * Read and validate the engine configuration file (bigints written as "123n")
 */
export function LoadEngineConfig(filename = ENGINE_CONFIG_FILE): EngineConfig {
  Log(`LoadEngineConfig: loading engine configuration from ${filename}`);
  const config: EngineConfig = ReadJSON(filename);
  ValidateEngineConfig(config);
  return config;
}

export function ValidateEngineConfig(config: EngineConfig) {
  for (const field of ['admins', 'priceReporters', 'assets', 'debtAssets', 'reserves', 'pools', 'vaults'] as const) {
    if (!Array.isArray(config[field])) {
      throw new ConfigurationError(`'${field}' must be an array`);
    }
  }
  if (!config.oracle || !Array.isArray(config.oracle.feeds)) {
    throw new ConfigurationError(`'oracle.feeds' must be an array`);
  }
  if (!config.auction || !config.auction.decay) {
    throw new ConfigurationError(`'auction' not set`);
  }
  if (!config.flashLoan || typeof config.flashLoan.feeBps != 'number') {
    throw new ConfigurationError(`'flashLoan.feeBps' not set`);
  }
  if (config.admins.length == 0) {
    throw new ConfigurationError('at least one admin is required');
  }

  const assetIds = new Set(config.assets.map((_) => _.id));
  const shareAssets = new Set(config.vaults.map((_) => _.shareAsset));
  const feedAssets = new Set(config.oracle.feeds.map((_) => _.asset));
  for (const shareFeed of config.oracle.vaultShareFeeds ?? []) {
    feedAssets.add(shareFeed.shareAsset);
  }
  const knownAsset = (asset: string) => assetIds.has(asset) || shareAssets.has(asset);

  for (const debtAsset of config.debtAssets) {
    if (!assetIds.has(debtAsset)) {
      throw new ConfigurationError(`debt asset ${debtAsset} is not a declared asset`);
    }
    if (!feedAssets.has(debtAsset)) {
      throw new ConfigurationError(`debt asset ${debtAsset} has no price feed`);
    }
  }
  for (const reserve of config.reserves) {
    if (!knownAsset(reserve.asset)) {
      throw new ConfigurationError(`reserve ${reserve.asset} is not a declared asset`);
    }
    if (!config.debtAssets.includes(reserve.debtAsset)) {
      throw new ConfigurationError(`reserve ${reserve.asset} borrows unlisted ${reserve.debtAsset}`);
    }
    if (!feedAssets.has(reserve.asset)) {
      throw new ConfigurationError(`reserve ${reserve.asset} has no price feed`);
    }
    if (typeof reserve.debtCeiling != 'bigint' || typeof reserve.minDebt != 'bigint') {
      throw new ConfigurationError(`reserve ${reserve.asset}: debtCeiling and minDebt must be written as "123n"`);
    }
  }
  for (const pool of config.pools) {
    if (!knownAsset(pool.assetA) || !knownAsset(pool.assetB)) {
      throw new ConfigurationError(`pool ${pool.id} trades an undeclared asset`);
    }
  }
  for (const vault of config.vaults) {
    if (!assetIds.has(vault.asset)) {
      throw new ConfigurationError(`vault ${vault.id} holds undeclared ${vault.asset}`);
    }
  }
  for (const twap of config.oracle.twapSources ?? []) {
    if (!config.pools.some((_) => _.id == twap.poolId)) {
      throw new ConfigurationError(`twap source for ${twap.asset} uses unknown pool ${twap.poolId}`);
    }
  }
}

/**
 * Build an engine from a configuration. Setup runs as admin transactions at `startTimestamp`.
 */
export function CreateEngineFromConfig(config: EngineConfig, startTimestamp = 0): LendingEngine {
  ValidateEngineConfig(config);
  const engine = new LendingEngine({
    admins: config.admins,
    priceReporters: config.priceReporters,
    auction: config.auction,
    flashLoan: config.flashLoan,
    sequencerGracePeriod: config.oracle.sequencer?.gracePeriod
  });
  const ctx = NewContext(config.admins[0], startTimestamp);

  for (const asset of config.assets) {
    RequireSuccess(engine.registerAsset(ctx, asset));
  }
  for (const feed of config.oracle.feeds) {
    engine.configureFeed(ctx, feed);
  }
  for (const vault of config.vaults) {
    RequireSuccess(engine.createVault(ctx, vault));
  }
  for (const shareFeed of config.oracle.vaultShareFeeds ?? []) {
    engine.setVaultShareFeed(ctx, shareFeed.shareAsset, shareFeed.vaultId);
  }
  for (const pool of config.pools) {
    RequireSuccess(engine.createPool(ctx, pool));
  }
  for (const twap of config.oracle.twapSources ?? []) {
    engine.setTwapSource(ctx, twap.asset, twap.poolId, twap.window);
  }
  for (const debtAsset of config.debtAssets) {
    RequireSuccess(engine.listDebtAsset(ctx, debtAsset));
  }
  for (const reserve of config.reserves) {
    RequireSuccess(engine.configureReserve(ctx, reserve));
  }

  Log(
    `CreateEngineFromConfig: engine ready with ${config.assets.length} assets, ${config.reserves.length} reserves, ${config.pools.length} pools, ${config.vaults.length} vaults`
  );
  return engine;
}

function RequireSuccess<T>(result: TransactionResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
