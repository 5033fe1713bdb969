/**
 * Finite state machine for one load run.
 *
 * Valid transitions:
 * - `START` → `REPLACING` | `ABORTED`
 * - `REPLACING` → `STREAMING` | `ABORTED`
 * - `STREAMING` → `REPORTING` | `ABORTED`
 * - `REPORTING` → `DONE` | `ABORTED`
 * - `DONE`, `ABORTED` → (terminal)
 *
 * The table is replaced in `REPLACING`, strictly before the first batch is
 * loaded in `STREAMING`.
 */
export const RunStatus = {
  START: 'START',
  REPLACING: 'REPLACING',
  STREAMING: 'STREAMING',
  REPORTING: 'REPORTING',
  DONE: 'DONE',
  ABORTED: 'ABORTED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.START]: [RunStatus.REPLACING, RunStatus.ABORTED],
  [RunStatus.REPLACING]: [RunStatus.STREAMING, RunStatus.ABORTED],
  [RunStatus.STREAMING]: [RunStatus.REPORTING, RunStatus.ABORTED],
  [RunStatus.REPORTING]: [RunStatus.DONE, RunStatus.ABORTED],
  [RunStatus.DONE]: [],
  [RunStatus.ABORTED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: RunStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
