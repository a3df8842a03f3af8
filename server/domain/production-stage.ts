import type { ProductionStage } from '../../shared/types';
import { StateViolationError } from '../lib/errors';

/** Every permitted stage change. DONE is terminal. */
export const STAGE_TRANSITIONS: Readonly<Record<ProductionStage, readonly ProductionStage[]>> = {
  DRAFT: ['IN_PROCESS'],
  IN_PROCESS: ['DONE'],
  DONE: [],
};

export function canTransition(from: ProductionStage, to: ProductionStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}

export function assertTransition(batchId: string, from: ProductionStage, to: ProductionStage): void {
  if (!canTransition(from, to)) {
    throw new StateViolationError(`Batch ${batchId} cannot move from ${from} to ${to}`, {
      batch_id: batchId,
      from,
      to,
    });
  }
}

/** Edits and deletion are allowed only while nothing has moved. */
export function assertEditable(batchId: string, stage: ProductionStage, action: string): void {
  if (stage !== 'DRAFT') {
    throw new StateViolationError(`Cannot ${action} batch ${batchId} in stage ${stage}; only DRAFT batches allow it`, {
      batch_id: batchId,
      stage,
    });
  }
}
