/**
 * Result of one formatting job. Every job sends exactly one.
 */
export type JobOutcome =
  | { kind: 'completed' }
  | { kind: 'diff'; diff: Buffer }
  | { kind: 'failed'; error: Error };

export const COMPLETED: JobOutcome = { kind: 'completed' };
