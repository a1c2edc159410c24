/**
 * The search backend did not pass its liveness probe.
 */
export class ConnectivityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectivityError';
    Object.setPrototypeOf(this, ConnectivityError.prototype);
  }
}
