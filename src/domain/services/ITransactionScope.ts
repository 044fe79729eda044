/**
 * State that a unit of work can save before it starts and restore when it
 * fails.
 */
export interface ICheckpointed {
  checkpoint(): void;
  commit(): void;
  rollback(): void;
}

/**
 * Makes the repository writes of one unit of work all-or-nothing. Writes made
 * by `work` are kept only if it resolves.
 */
export interface ITransactionScope {
  runInTransaction<T>(work: () => Promise<T>): Promise<T>;
}
