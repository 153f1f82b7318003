import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { ProcessOrdersResponseDto } from '../../dto';

/**
 * Swagger decorator for processing a user's pending orders
 */
export const ApiProcessOrders = () => {
  return applyDecorators(
    ApiOperation({
      summary: "Process a user's pending orders",
      description:
        'Runs every order still in status "new" through type dispatch, priority and persistence, in fetch order',
    }),
    ApiParam({
      name: 'userId',
      description: 'Numeric user identifier',
      example: 42,
    }),
    ApiResponse({
      status: 200,
      description: 'Batch processed; per-order failures are reported as statuses',
      type: ProcessOrdersResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'userId is not an integer',
    }),
    ApiResponse({
      status: 503,
      description: 'Orders could not be loaded from storage',
    }),
  );
};
