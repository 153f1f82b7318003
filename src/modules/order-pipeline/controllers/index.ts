export { OrdersController } from './orders.controller';
export { HealthController } from './health.controller';
