import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { OrderPriority, OrderStatus } from '../../core/domain/enums';
import type { OrderId, OrderSnapshot } from '../../core/domain/models';
import type { ProcessingSummary } from '../../modules/order-pipeline/services';

/**
 * Order as returned after processing
 */
export class OrderResponseDto implements OrderSnapshot {
  @ApiProperty({
    description: 'Order identifier',
    oneOf: [{ type: 'number' }, { type: 'string' }],
    nullable: true,
    example: 17,
  })
  id!: OrderId;

  @ApiProperty({
    description: 'Order type; anything but A, B or C is unknown',
    type: String,
    nullable: true,
    example: 'B',
  })
  type!: string | null;

  @ApiPropertyOptional({
    description: 'Order amount',
    type: Number,
    nullable: true,
    example: 80,
  })
  amount!: number | null;

  @ApiPropertyOptional({
    description: 'Order flag',
    type: Boolean,
    nullable: true,
    example: false,
  })
  flag!: boolean | null;

  @ApiProperty({
    description: 'Status after processing',
    enum: OrderStatus,
    example: OrderStatus.PROCESSED,
  })
  status!: OrderStatus;

  @ApiProperty({
    description: 'Priority after processing',
    enum: OrderPriority,
    example: OrderPriority.LOW,
  })
  priority!: OrderPriority;
}

/**
 * Summary of one processing run
 */
export class ProcessOrdersResponseDto implements ProcessingSummary {
  @ApiProperty({ description: 'User whose orders were processed', example: 42 })
  userId!: number;

  @ApiProperty({ description: 'Number of orders processed', example: 3 })
  total!: number;

  @ApiProperty({
    description: 'Orders that ended in export_failed, api_failure or db_error',
    example: 0,
  })
  failed!: number;

  @ApiProperty({
    description: 'Number of orders per resulting status',
    type: 'object',
    additionalProperties: { type: 'number' },
    example: { exported: 1, processed: 1, completed: 1 },
  })
  statusCounts!: Record<string, number>;

  @ApiProperty({
    description: 'Processed orders in fetch order',
    type: [OrderResponseDto],
  })
  orders!: OrderResponseDto[];
}
