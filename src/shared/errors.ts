/**
 * Raised for caller input the aligner refuses to process (empty reference, bad weights).
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
