export { MockStorageAdapter } from './mock-storage.adapter';
export type {
  MockStorageOptions,
  SeedOrder,
  StoredOrder,
  UpdateCall,
} from './mock-storage.adapter';
