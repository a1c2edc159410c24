/**
 * Transport failure of a remote collaborator. A status code of 0 means no
 * response was received.
 */
export class ClientError extends Error {
  statusCode: number;
  error?: string;

  constructor(message: string, statusCode: number, error?: string) {
    super(message);
    this.name = 'ClientError';
    this.statusCode = statusCode;
    this.error = error;
    Object.setPrototypeOf(this, ClientError.prototype);
  }
}
