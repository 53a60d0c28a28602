import path from 'path';
import * as dotenv from 'dotenv';
dotenv.config();

export const APP_NAME = process.env.APP_NAME || 'LENDING_ENGINE';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// release builds still reject invariant violations, they only skip the error-level dump of the state
export const IS_RELEASE_BUILD = process.env.NODE_ENV == 'production';

export const ENGINE_CONFIG_FILE =
  process.env.ENGINE_CONFIG_FILE || path.join(process.cwd(), 'params', 'engine-config.json');
export const DATA_DIR = path.join(process.cwd(), 'data');
export const ENGINE_STATE_FILE = process.env.ENGINE_STATE_FILE || path.join(DATA_DIR, 'engine-state.json');

export const WAD = 10n ** 18n;
export const RAY = 10n ** 27n;
export const BPS = 10_000n;

// uniswap v2 locks the first 1000 LP shares forever
export const MINIMUM_LIQUIDITY = 1000n;
export const DEFAULT_VIRTUAL_SHARES = 1000n;
export const DEFAULT_OBSERVATION_CARDINALITY = 32;
