/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(
    message: string,
    public readonly fen: string,
  ) {
    super(message);
    this.name = 'InvalidFenError';
  }
}
