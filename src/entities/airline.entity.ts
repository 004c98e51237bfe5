import { Entity, Column, Index, PrimaryColumn } from 'typeorm';
import { BaseEntity } from './base.entity';
import { EntityMetadata } from '../types/entity.types';

@Entity('airlines')
export class Airline extends BaseEntity {
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  @Index('idx_airlines_name')
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  alias!: string | null;

  @Column({ type: 'varchar', length: 8, nullable: true })
  iata!: string | null;

  @Column({ type: 'varchar', length: 8, nullable: true })
  icao!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  callsign!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  @Index('idx_airlines_country')
  country!: string | null;

  @Column({ type: 'char', length: 1, nullable: true })
  active!: 'Y' | 'N' | null;

  @Column({ type: 'text', nullable: true, name: 'logo_url' })
  logoUrl!: string | null;

  @Column({ type: 'json', nullable: true })
  metadata!: EntityMetadata | null;

  @Column({ type: 'text', select: false, insert: false, update: false })
  embedding!: string;
}
