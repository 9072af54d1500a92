// Input rejected at the boundary before accounting starts.
export class MalformedRecordError extends Error {
  constructor(
    message: string,
    readonly recordId?: string,
  ) {
    super(recordId ? `Malformed record ${recordId}: ${message}` : `Malformed record: ${message}`);
    this.name = 'MalformedRecordError';
  }
}
