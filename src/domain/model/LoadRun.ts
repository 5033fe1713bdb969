/** Identity and table state of one execution, shared with the batch loader. */
export interface LoadRun {
  readonly runId: string;
  readonly startedAt: number;
  /** `true` once the target table has been fully replaced for this run. */
  readonly tableReplaced: boolean;
}

export function createLoadRun(runId: string, startedAt: number): LoadRun {
  return { runId, startedAt, tableReplaced: false };
}

export function markTableReplaced(run: LoadRun): LoadRun {
  return { ...run, tableReplaced: true };
}
