import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

export type FieldMappingType =
  | 'motor_voltage'
  | 'motor_current'
  | 'motor_power'
  | 'motor_frequency'
  | 'load'
  | 'capacity'
  | 'io_status'
  | 'alarm';

/**
 * FieldMapping Entity - per-crane override of the generic field router.
 *
 * Maps a payload field name (e.g. "DB1.DBD12") to a canonical field name
 * (e.g. "hoist_power"). Active mappings win over substring routing for
 * that crane's messages.
 */
@Entity('crane_field_mappings')
@Index('uq_field_mapping_crane_field', ['craneId', 'incomingFieldName'], {
  unique: true,
})
export class FieldMapping {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  craneId!: number;

  @Column({ type: 'varchar', length: 100 })
  incomingFieldName!: string;

  @Column({ type: 'varchar', length: 100 })
  mappedFieldName!: string;

  @Column({ type: 'varchar', length: 50 })
  fieldType!: FieldMappingType;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
