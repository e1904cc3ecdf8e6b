export type FatalCondition = {
  fileName: string;
  message: string;
  line?: number;
};

/**
 * Outcome of one decoding, correlation or conversion step. Callers merge the
 * values they receive instead of sharing mutable error flags.
 */
export interface RunStatus {
  fatal: FatalCondition[];
  /** records skipped after a per-node or per-line failure */
  recovered: number;
  /** scan-property conflicts and unsupported scan-property writes */
  conflicts: number;
}

export function createStatus(fields: Partial<RunStatus> = {}): RunStatus {
  return {
    fatal: fields.fatal ? [...fields.fatal] : [],
    recovered: fields.recovered ?? 0,
    conflicts: fields.conflicts ?? 0
  };
}

export function mergeStatus(...statuses: RunStatus[]): RunStatus {
  return statuses.reduce<RunStatus>(
    (acc, status) => ({
      fatal: [...acc.fatal, ...status.fatal],
      recovered: acc.recovered + status.recovered,
      conflicts: acc.conflicts + status.conflicts
    }),
    createStatus()
  );
}

/** Conflicts are reported but never fail a run on their own. */
export function hasFailure(status: RunStatus): boolean {
  return status.fatal.length > 0 || status.recovered > 0;
}
