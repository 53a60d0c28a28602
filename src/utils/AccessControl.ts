import { ExecutionContext } from '../model/ExecutionContext';
import { UnauthorizedError } from './Errors';

/**
 * Throws UnauthorizedError unless the caller of `ctx` is in `allowed`
 */
export function RequireCaller(ctx: ExecutionContext, allowed: readonly string[], action: string) {
  if (!allowed.includes(ctx.callerId)) {
    throw new UnauthorizedError(ctx.callerId, action);
  }
}
