/** Lifecycle of a `SheetValidator` run. */
export const RunStatus = {
  CREATED: 'CREATED',
  PREVIEWING: 'PREVIEWING',
  PREVIEWED: 'PREVIEWED',
  VALIDATING: 'VALIDATING',
  VALIDATED: 'VALIDATED',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.PREVIEWING, RunStatus.VALIDATING],
  [RunStatus.PREVIEWING]: [RunStatus.PREVIEWED, RunStatus.FAILED],
  [RunStatus.PREVIEWED]: [RunStatus.PREVIEWING, RunStatus.VALIDATING],
  [RunStatus.VALIDATING]: [RunStatus.VALIDATED, RunStatus.FAILED],
  [RunStatus.VALIDATED]: [],
  [RunStatus.FAILED]: [],
};

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
