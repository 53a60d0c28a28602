import { DecayConfig } from '../../model/Auction';
import { RAY } from '../../utils/Constants';
import { ConfigurationError } from '../../utils/Errors';
import { mulDiv, rpow } from '../../utils/FixedPointMath';

/**
 * Auction price after `elapsed` seconds. Every implementation is non-increasing in `elapsed`.
 */
export type DecayFunction = (startPrice: bigint, elapsed: number) => bigint;

export function ValidateDecayConfig(config: DecayConfig) {
  switch (config.kind) {
    case 'linear':
      if (config.duration <= 0) {
        throw new ConfigurationError(`linear decay needs a positive duration, got ${config.duration}`);
      }
      break;
    case 'stairstep':
      if (config.step <= 0 || config.cut <= 0n || config.cut > RAY) {
        throw new ConfigurationError(`stairstep decay needs step > 0 and 0 < cut <= 1 ray`);
      }
      break;
    case 'exponential':
      if (config.cut <= 0n || config.cut > RAY) {
        throw new ConfigurationError(`exponential decay needs 0 < cut <= 1 ray`);
      }
      break;
  }
}

export function CreateDecayFunction(config: DecayConfig): DecayFunction {
  ValidateDecayConfig(config);
  switch (config.kind) {
    case 'linear':
      return (startPrice, elapsed) => {
        if (elapsed >= config.duration) {
          return 0n;
        }
        return mulDiv(startPrice, BigInt(config.duration - Math.max(elapsed, 0)), BigInt(config.duration));
      };
    case 'stairstep':
      return (startPrice, elapsed) => {
        const steps = Math.floor(Math.max(elapsed, 0) / config.step);
        return mulDiv(startPrice, rpow(config.cut, steps, RAY), RAY);
      };
    case 'exponential':
      return (startPrice, elapsed) => mulDiv(startPrice, rpow(config.cut, Math.max(elapsed, 0), RAY), RAY);
  }
}
