import type { Pos } from './index';

/**
 * Raised while reducing a tree, on cancellation or when the tree is nested past
 * MAX_DEPTH. Failures from a child reduction propagate unchanged.
 */
export class ReduceError extends Error {
  constructor(message: string, public readonly pos: Pos, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReduceError';
  }
}
