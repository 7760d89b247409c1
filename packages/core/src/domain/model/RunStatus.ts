/**
 * Finite state machine for a run's lifecycle.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `COMPLETED` | `CANCELLED` | `FAILED`
 * - `COMPLETED`, `CANCELLED`, `FAILED` → (terminal)
 */
export const RunStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.RUNNING],
  [RunStatus.RUNNING]: [RunStatus.COMPLETED, RunStatus.CANCELLED, RunStatus.FAILED],
  [RunStatus.COMPLETED]: [],
  [RunStatus.CANCELLED]: [],
  [RunStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Whether no further transition can leave this status. */
export function isTerminal(status: RunStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
