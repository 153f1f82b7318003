import {
  ExportSink,
  ExportSinkError,
  SinkHandle,
} from '../../../core/interfaces';

/**
 * In-memory export sink for testing
 * Records every destination and the rows written to it
 */
export class MemoryExportSink implements ExportSink {
  private readonly files: Map<string, string[][]> = new Map();
  private readonly closedFiles: string[] = [];
  private failure: 'prepare' | 'open' | null = null;

  /**
   * Make the next prepare() or open() calls fail until reset
   */
  failOn(step: 'prepare' | 'open' | null): void {
    this.failure = step;
  }

  async prepare(): Promise<void> {
    if (this.failure === 'prepare') {
      throw new ExportSinkError('Simulated prepare failure', 'memory');
    }
  }

  async open(name: string): Promise<SinkHandle> {
    if (this.failure === 'open') {
      throw new ExportSinkError(`Simulated open failure for ${name}`, name);
    }

    this.files.set(name, []);
    return { name };
  }

  async writeRow(handle: SinkHandle, fields: string[]): Promise<void> {
    const rows = this.files.get(handle.name);
    if (!rows) {
      throw new Error(`Destination not open: ${handle.name}`);
    }
    rows.push([...fields]);
  }

  async close(handle: SinkHandle): Promise<void> {
    this.closedFiles.push(handle.name);
  }

  // ==================== Test Helpers ====================

  getFileNames(): string[] {
    return Array.from(this.files.keys());
  }

  getRows(name: string): string[][] {
    return this.files.get(name) ?? [];
  }

  getClosedFiles(): string[] {
    return [...this.closedFiles];
  }

  clear(): void {
    this.files.clear();
    this.closedFiles.length = 0;
    this.failure = null;
  }
}
