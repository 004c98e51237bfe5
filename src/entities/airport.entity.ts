import { Entity, Column, Index, PrimaryColumn } from 'typeorm';
import { BaseEntity } from './base.entity';
import { EntityMetadata } from '../types/entity.types';

@Entity('airports')
export class Airport extends BaseEntity {
  // OpenFlights airport id, also the upsert key
  @PrimaryColumn({ type: 'int' })
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  @Index('idx_airports_city')
  city!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  @Index('idx_airports_country')
  country!: string | null;

  @Column({ type: 'varchar', length: 8, nullable: true })
  iata!: string | null;

  @Column({ type: 'varchar', length: 8, nullable: true })
  icao!: string | null;

  @Column({ type: 'double', nullable: true })
  latitude!: number | null;

  @Column({ type: 'double', nullable: true })
  longitude!: number | null;

  @Column({ type: 'text', nullable: true, name: 'image_url' })
  imageUrl!: string | null;

  @Column({ type: 'json', nullable: true })
  metadata!: EntityMetadata | null;

  // VECTOR(512) in MariaDB. TypeORM has no vector type for this driver, so
  // the column is written with VEC_FromText and read through raw SQL only.
  @Column({ type: 'text', select: false, insert: false, update: false })
  embedding!: string;
}
