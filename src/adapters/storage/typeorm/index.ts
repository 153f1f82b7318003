/**
 * TypeORM Storage Adapter
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export { createDataSource, createTypeORMConfig } from './typeorm.config';
export * from './entities';
