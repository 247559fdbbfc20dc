import { Knex } from 'knex';
import { isOperationState } from '@handoff/sdk';
import { OperationState, OperationTransition } from '../types/handoff.types';
import { TransitionRepository } from '../store/handoff-store';

interface OperationTransitionRow {
  operation_id: string;
  version: number;
  from_state: string | null;
  to_state: string;
  terminal_reason: string | null;
  actor_id: string | null;
  occurred_at: Date;
}

export class OperationTransitionModel implements TransitionRepository {
  constructor(private readonly db: Knex) {}

  async append(transition: OperationTransition): Promise<void> {
    await this.db<OperationTransitionRow>('operation_transitions').insert({
      operation_id: transition.operationId,
      version: transition.version,
      from_state: transition.fromState,
      to_state: transition.toState,
      terminal_reason: transition.terminalReason,
      actor_id: transition.actorId,
      occurred_at: transition.occurredAt,
    });
  }

  async listAfter(operationId: string, afterVersion: number): Promise<OperationTransition[]> {
    const rows = await this.db<OperationTransitionRow>('operation_transitions')
      .where({ operation_id: operationId })
      .where('version', '>', afterVersion)
      .orderBy('version', 'asc');
    return rows.flatMap((row) => {
      // rows written by this service always carry a known state
      if (!isOperationState(row.to_state)) return [];
      const fromState: OperationState | null =
        row.from_state !== null && isOperationState(row.from_state) ? row.from_state : null;
      return [
        {
          operationId: row.operation_id,
          version: row.version,
          fromState,
          toState: row.to_state,
          terminalReason: row.terminal_reason,
          actorId: row.actor_id,
          occurredAt: row.occurred_at,
        },
      ];
    });
  }
}
