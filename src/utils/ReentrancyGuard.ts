import { ReentrancyError } from './Errors';

/**
 * Marks a component as mid-mutation; any call that re-enters the same guard before the
 * outer call returns fails with ReentrancyError.
 */
export class ReentrancyGuard {
  private entered = false;

  constructor(readonly component: string) {}

  get isEntered(): boolean {
    return this.entered;
  }

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new ReentrancyError(this.component);
    }

    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
