/**
 * Blob transport failure (delivery refused, API error, malformed reply)
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'TransportError';
  }
}
