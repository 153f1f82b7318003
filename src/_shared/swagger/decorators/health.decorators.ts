import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description: 'Checks whether order storage is reachable',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              storage: { type: 'boolean', example: true },
              pipeline: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              storage: { type: 'string', example: 'connected' },
              pipeline: {
                type: 'object',
                properties: {
                  stages: { type: 'array', items: { type: 'string' } },
                  handlers: { type: 'array', items: { type: 'string' } },
                  exportSink: { type: 'string', example: 'CsvFileSink' },
                  classificationAdapter: { type: 'string', example: 'http' },
                },
              },
            },
          },
        },
      },
    }),
  );
};
