export class BrowserTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrowserTimeoutError';
  }
}
