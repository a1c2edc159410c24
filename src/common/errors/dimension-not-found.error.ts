/**
 * The content tree has no root node for the requested dimension.
 */
export class DimensionNotFoundError extends Error {
  constructor(dimension: string) {
    super(`Content server dimension ${dimension} not found`);
    this.name = 'DimensionNotFoundError';
    Object.setPrototypeOf(this, DimensionNotFoundError.prototype);
  }
}
