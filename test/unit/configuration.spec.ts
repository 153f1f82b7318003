import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_EXPORT_DIRECTORY,
  defaultOrderPipelineConfig,
  mergeOrderPipelineConfig,
  orderPipelineConfigFromEnv,
} from '../../src';

describe('Order pipeline configuration', () => {
  describe('mergeOrderPipelineConfig', () => {
    it('should fall back to mock adapters and the default directory', () => {
      const config = mergeOrderPipelineConfig({});

      expect(config).toEqual(defaultOrderPipelineConfig);
      expect(config.export?.directory).toBe(DEFAULT_EXPORT_DIRECTORY);
    });

    it('should keep defaults of nested sections', () => {
      const config = mergeOrderPipelineConfig({
        classification: { type: 'http', baseUrl: 'https://classifier.test' },
      });

      expect(config.classification).toEqual({
        type: 'http',
        baseUrl: 'https://classifier.test',
        timeoutMs: 5000,
      });
      expect(config.storage).toEqual({ type: 'mock' });
    });
  });

  describe('orderPipelineConfigFromEnv', () => {
    const keys = [
      'ORDER_STORAGE',
      'DB_HOST',
      'DB_PORT',
      'DB_USERNAME',
      'DB_PASSWORD',
      'DB_NAME',
      'CLASSIFIER_URL',
      'CLASSIFIER_API_KEY',
      'CLASSIFIER_TIMEOUT_MS',
      'ORDER_EXPORT_DIR',
      'NODE_ENV',
    ];
    const originalEnv = process.env;

    beforeEach(() => {
      process.env = { ...originalEnv };
      for (const key of keys) {
        delete process.env[key];
      }
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('should use mock adapters when nothing is set', () => {
      const config = orderPipelineConfigFromEnv(new ConfigService());

      expect(config.storage).toEqual({ type: 'mock' });
      expect(config.classification.type).toBe('mock');
      expect(config.export?.directory).toBe(DEFAULT_EXPORT_DIRECTORY);
      expect(config.environment).toBe('development');
      expect(config.debug).toBe(true);
    });

    it('should read database and classifier settings', () => {
      Object.assign(process.env, {
        ORDER_STORAGE: 'typeorm',
        DB_HOST: 'db.internal',
        DB_PORT: '6543',
        DB_USERNAME: 'pipeline',
        DB_PASSWORD: 'test-secret',
        DB_NAME: 'orders_test',
        CLASSIFIER_URL: 'https://classifier.test',
        CLASSIFIER_API_KEY: 'test-secret',
        CLASSIFIER_TIMEOUT_MS: '250',
        ORDER_EXPORT_DIR: '/tmp/exports',
        NODE_ENV: 'production',
      });

      const config = orderPipelineConfigFromEnv(new ConfigService());

      expect(config.storage).toEqual({
        type: 'typeorm',
        options: {
          host: 'db.internal',
          port: 6543,
          username: 'pipeline',
          password: 'test-secret',
          database: 'orders_test',
        },
      });
      expect(config.classification).toEqual({
        type: 'http',
        baseUrl: 'https://classifier.test',
        apiKey: 'test-secret',
        timeoutMs: 250,
      });
      expect(config.export?.directory).toBe('/tmp/exports');
      expect(config.environment).toBe('production');
      expect(config.debug).toBe(false);
    });

    it('should ignore an unparsable timeout', () => {
      Object.assign(process.env, {
        CLASSIFIER_URL: 'https://classifier.test',
        CLASSIFIER_TIMEOUT_MS: 'soon',
      });

      const config = orderPipelineConfigFromEnv(new ConfigService());

      expect(config.classification.timeoutMs).toBe(5000);
    });

    it('should fall back to development for unknown environments', () => {
      process.env.NODE_ENV = 'qa';

      const config = orderPipelineConfigFromEnv(new ConfigService());

      expect(config.environment).toBe('development');
    });
  });
});
