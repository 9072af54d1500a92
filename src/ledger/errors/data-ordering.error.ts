// Lot-affecting records for one key arrived out of timestamp order.
// Fatal: continuing would corrupt the running average cost.
export class DataOrderingError extends Error {
  constructor(
    readonly key: string,
    readonly recordId: string,
    readonly previous: Date,
    readonly current: Date,
  ) {
    super(
      `Out-of-order record ${recordId} for ${key}: ${current.toISOString()} precedes ${previous.toISOString()}`,
    );
    this.name = 'DataOrderingError';
  }
}
