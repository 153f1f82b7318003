/**
 * Handle to one open export destination
 */
export interface SinkHandle {
  readonly name: string;
}

/**
 * Export sink interface - row-oriented, append-only write destination
 *
 * open() may fail; once it succeeds, writeRow() and close() are expected to
 * succeed and close() must be called exactly once.
 */
export interface ExportSink<H extends SinkHandle = SinkHandle> {
  /**
   * Make sure the storage location exists (idempotent)
   */
  prepare(): Promise<void>;

  /**
   * Open a named destination
   * @throws ExportSinkError when the destination cannot be opened
   */
  open(name: string): Promise<H>;

  writeRow(handle: H, fields: string[]): Promise<void>;

  close(handle: H): Promise<void>;
}

/**
 * Export destination could not be prepared or opened
 */
export class ExportSinkError extends Error {
  constructor(
    message: string,
    public destination: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ExportSinkError';
  }
}
