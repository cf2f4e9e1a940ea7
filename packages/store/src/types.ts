/**
 * A whole document read and written in one piece. Callers load once per run,
 * mutate in memory and write back once.
 */
export interface DocumentStore<T> {
  read(): Promise<T>;
  write(document: T): Promise<void>;
}
