import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { OrderPriority, OrderStatus } from '../../../../core';

/**
 * TypeORM entity for Order
 */
@Entity('orders')
@Index(['userId', 'status'])
export class OrderEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ type: 'varchar', length: 32, nullable: true })
  type!: string | null;

  @Column({ type: 'double precision', nullable: true })
  amount!: number | null;

  @Column({ type: 'boolean', nullable: true })
  flag!: boolean | null;

  @Column({ type: 'varchar', length: 32, default: OrderStatus.NEW })
  status!: OrderStatus;

  @Column({ type: 'varchar', length: 16, default: OrderPriority.LOW })
  priority!: OrderPriority;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
