import { Order } from '../../domain/models';
import { OrderStatus } from '../../domain/enums';
import {
  ExportSink,
  ExportSinkError,
  Logger,
  SinkHandle,
} from '../../interfaces';
import { needsHighValueNote } from '../../state-machine';
import { HandlerOutcome, OrderHandler } from '../types';

export const EXPORT_HEADER_ROW = [
  'ID',
  'Type',
  'Amount',
  'Flag',
  'Status',
  'Priority',
];

export const HIGH_VALUE_NOTE_ROW = ['', '', '', '', 'Note', 'High value order'];

/**
 * Export file name for an order: orders_type_A_<id>_<unix seconds>.csv
 */
export function exportFileName(order: Order, now: Date): string {
  const id = order.id === null ? '' : String(order.id);
  return `orders_type_A_${id}_${Math.floor(now.getTime() / 1000)}.csv`;
}

/**
 * Type A: write the order to its own CSV export
 *
 * The data row is written before the status changes, so it carries the
 * order's status and priority as loaded.
 */
export class CsvExportHandler implements OrderHandler {
  readonly name = 'csv-export';

  constructor(
    private readonly exportSink: ExportSink,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async handle(order: Order): Promise<HandlerOutcome> {
    const destination = exportFileName(order, this.clock());
    let handle: SinkHandle;

    try {
      await this.exportSink.prepare();
      handle = await this.exportSink.open(destination);
    } catch (error) {
      if (error instanceof ExportSinkError) {
        this.logger.warn(
          `Export of order ${order.id} to ${destination} failed: ${error.message}`,
        );
        return { status: OrderStatus.EXPORT_FAILED, error };
      }
      throw error;
    }

    try {
      await this.writeOrder(handle, order);
    } finally {
      await this.exportSink.close(handle);
    }

    this.logger.debug(`Order ${order.id} exported to ${handle.name}`);
    return { status: OrderStatus.EXPORTED };
  }

  private async writeOrder(handle: SinkHandle, order: Order): Promise<void> {
    await this.exportSink.writeRow(handle, EXPORT_HEADER_ROW);
    await this.exportSink.writeRow(handle, order.toRow());

    if (needsHighValueNote(order)) {
      await this.exportSink.writeRow(handle, HIGH_VALUE_NOTE_ROW);
    }
  }
}
