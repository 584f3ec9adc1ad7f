export const MergeStatus = {
  ENUMERATING: 'ENUMERATING',
  HEADER_ESTABLISHED: 'HEADER_ESTABLISHED',
  MERGING: 'MERGING',
  FLUSHED: 'FLUSHED',
  PROMOTED: 'PROMOTED',
  SKIPPED: 'SKIPPED',
  FAILED: 'FAILED',
} as const;

export type MergeStatus = (typeof MergeStatus)[keyof typeof MergeStatus];

const VALID_TRANSITIONS: Record<MergeStatus, readonly MergeStatus[]> = {
  [MergeStatus.ENUMERATING]: [MergeStatus.HEADER_ESTABLISHED, MergeStatus.SKIPPED, MergeStatus.FAILED],
  [MergeStatus.HEADER_ESTABLISHED]: [MergeStatus.MERGING, MergeStatus.FAILED],
  [MergeStatus.MERGING]: [MergeStatus.FLUSHED, MergeStatus.FAILED],
  [MergeStatus.FLUSHED]: [MergeStatus.PROMOTED, MergeStatus.FAILED],
  [MergeStatus.PROMOTED]: [],
  [MergeStatus.SKIPPED]: [],
  [MergeStatus.FAILED]: [],
};

export function canTransition(from: MergeStatus, to: MergeStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: MergeStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
