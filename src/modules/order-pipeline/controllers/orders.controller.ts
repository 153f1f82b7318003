import {
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { PersistenceError } from '../../../core';
import { ApiProcessOrders } from '../../../_shared/swagger/decorators';
import { ProcessOrdersResponseDto } from '../../../_shared/dto';
import { OrderPipelineService } from '../services/order-pipeline.service';

/**
 * Orders Controller
 */
@ApiTags('Orders')
@Controller('orders')
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);

  constructor(
    @Inject(OrderPipelineService)
    private readonly pipelineService: OrderPipelineService,
  ) {}

  @Post('users/:userId/process')
  @HttpCode(HttpStatus.OK)
  @ApiProcessOrders()
  async processOrders(
    @Param('userId', ParseIntPipe) userId: number,
  ): Promise<ProcessOrdersResponseDto> {
    this.logger.log(`Processing orders for user ${userId}`);

    try {
      return await this.pipelineService.processOrdersForUser(userId);
    } catch (error) {
      this.logger.error(`Failed to process orders for user ${userId}: ${error}`);

      if (error instanceof PersistenceError) {
        throw new ServiceUnavailableException(error.message);
      }

      throw error;
    }
  }
}
