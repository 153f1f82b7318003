import { DataSource } from 'typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { OrderEntity } from './entities';

/**
 * TypeORM configuration for the order store
 */
export const createTypeORMConfig = (
  options: Partial<PostgresConnectionOptions> = {},
): PostgresConnectionOptions => {
  const defaultConfig: PostgresConnectionOptions = {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'orders',
    password: process.env.DB_PASSWORD || 'orders',
    database: process.env.DB_NAME || 'orders',
    entities: [OrderEntity],
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };

  return {
    ...defaultConfig,
    ...options,
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  options?: Partial<PostgresConnectionOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
