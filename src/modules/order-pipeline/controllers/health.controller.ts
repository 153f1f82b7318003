import { Controller, Get, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { PipelineStatistics } from '../../../core';
import { OrderPipelineService } from '../services/order-pipeline.service';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(OrderPipelineService)
    private readonly pipelineService: OrderPipelineService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: 'ready' | 'not_ready';
    checks: {
      storage: boolean;
      pipeline: boolean;
    };
    details: {
      storage: string;
      pipeline: PipelineStatistics;
    };
  }> {
    const storageHealthy = await this.pipelineService.isStorageHealthy();

    return {
      status: storageHealthy ? 'ready' : 'not_ready',
      checks: {
        storage: storageHealthy,
        pipeline: true,
      },
      details: {
        storage: storageHealthy ? 'connected' : 'disconnected',
        pipeline: this.pipelineService.getStatistics(),
      },
    };
  }
}
