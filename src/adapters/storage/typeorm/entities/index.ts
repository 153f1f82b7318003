export { OrderEntity } from './order.entity';
