import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { Crane } from './crane.entity';

/**
 * TopicBinding Entity - maps an MQTT topic to the crane publishing on it.
 *
 * Invariant: at most one active binding per crane, enforced by a partial
 * unique index. Several inactive (historical) bindings may coexist.
 */
@Entity('crane_topic_bindings')
@Index('uq_topic_binding_active_crane', ['craneId'], {
  unique: true,
  where: '"isActive" = true',
})
@Index('idx_topic_binding_topic', ['mqttTopic'])
export class TopicBinding {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  craneId!: number;

  @ManyToOne(() => Crane, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'craneId' })
  crane!: Crane;

  /** Gateway that forwards the crane's PLC data (informational) */
  @Column({ type: 'varchar', length: 100, default: '' })
  gatewayName!: string;

  @Column({ type: 'varchar', length: 255 })
  mqttTopic!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
