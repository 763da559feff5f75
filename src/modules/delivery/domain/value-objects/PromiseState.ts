/**
 * PromiseState enum
 * Lifecycle of a DeliveryPromise: PENDING → (RESOLVED | REJECTED)
 */
export enum PromiseState {
  PENDING = 'PENDING',
  RESOLVED = 'RESOLVED',
  REJECTED = 'REJECTED',
}

/**
 * Valid state transitions mapping
 * RESOLVED and REJECTED are terminal states
 */
const VALID_TRANSITIONS: Record<PromiseState, PromiseState[]> = {
  [PromiseState.PENDING]: [PromiseState.RESOLVED, PromiseState.REJECTED],
  [PromiseState.RESOLVED]: [],
  [PromiseState.REJECTED]: [],
};

export function isValidTransition(from: PromiseState, to: PromiseState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
