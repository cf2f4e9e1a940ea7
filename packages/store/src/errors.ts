export class StoreCorruptedError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Store at ${path} is unreadable: ${detail}`);
    this.name = 'StoreCorruptedError';
    this.path = path;
  }
}
