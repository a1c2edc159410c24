export class BuildInProgressError extends Error {
  constructor() {
    super('A build is already running in this process');
    this.name = 'BuildInProgressError';
    Object.setPrototypeOf(this, BuildInProgressError.prototype);
  }
}
