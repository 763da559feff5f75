import { InvalidStateTransitionError } from '../../../../domain/errors/InvalidStateTransitionError';

/**
 * SenderState enum
 * Lifecycle of the async sender with enforced state machine transitions
 */
export enum SenderState {
  IDLE = 'IDLE',
  OPEN = 'OPEN',
  CLOSING = 'CLOSING',
  CLOSED = 'CLOSED',
}

/**
 * Valid state transitions mapping
 * IDLE → OPEN → CLOSING → CLOSED, or IDLE → CLOSED when closed before start.
 * CLOSED is terminal.
 */
const VALID_TRANSITIONS: Record<SenderState, SenderState[]> = {
  [SenderState.IDLE]: [SenderState.OPEN, SenderState.CLOSED],
  [SenderState.OPEN]: [SenderState.CLOSING],
  [SenderState.CLOSING]: [SenderState.CLOSED],
  [SenderState.CLOSED]: [],
};

export function isValidTransition(from: SenderState, to: SenderState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Throws InvalidStateTransitionError if the transition is invalid
 */
export function validateTransition(from: SenderState, to: SenderState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}
