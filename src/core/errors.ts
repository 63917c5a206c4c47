/** Raised for any request that cannot become a valid Selection. */
export class InvalidSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSelectionError';
  }
}
