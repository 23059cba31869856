/**
 * Raised by a classification policy that could not reach a verdict.
 * QueryClassifierService turns it into a generic classification.
 */
export class ClassificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
  }
}
