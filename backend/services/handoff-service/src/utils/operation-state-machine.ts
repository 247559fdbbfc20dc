/**
 * Operation State Machine
 * Enforces valid pending-operation state transitions
 */

import type { OperationState } from '../types/handoff.types';

export class OperationStateMachine {
  /**
   * Key = current state, Value = states reachable in one step
   */
  private static readonly transitions: Record<OperationState, OperationState[]> = {
    waiting: ['pending', 'cancelled', 'expired'],
    pending: ['processing', 'cancelled', 'failed', 'expired'],
    processing: ['completed', 'cancelled', 'failed', 'expired'],
    completed: [],
    failed: [],
    cancelled: [],
    expired: [],
  };

  static canTransition(from: OperationState, to: OperationState): boolean {
    return this.transitions[from].includes(to);
  }

  static isTerminalState(state: OperationState): boolean {
    return this.transitions[state].length === 0;
  }

  /**
   * Shortest legal path from one state to another along forward edges,
   * excluding the starting state. Null when the target is unreachable.
   */
  static pathTo(from: OperationState, to: OperationState): OperationState[] | null {
    if (from === to) {
      return [];
    }
    const queue: OperationState[][] = [[from]];
    const seen = new Set<OperationState>([from]);
    while (queue.length > 0) {
      const path = queue.shift() ?? [];
      const last = path[path.length - 1];
      for (const next of this.transitions[last]) {
        if (seen.has(next)) continue;
        const extended = [...path, next];
        if (next === to) {
          return extended.slice(1);
        }
        seen.add(next);
        queue.push(extended);
      }
    }
    return null;
  }
}
