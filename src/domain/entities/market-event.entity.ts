import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { AnalysisPayload } from '../types/results.types';

@Entity('market_events')
export class MarketEventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'event_type', type: 'varchar' })
  @Index()
  eventType!: string;

  @Column({ type: 'varchar' })
  source!: string;

  @Column({ type: 'varchar' })
  severity!: string;

  @Column({ type: 'varchar' })
  @Index()
  subject!: string;

  @Column({ type: 'varchar' })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'simple-json' })
  payload!: AnalysisPayload;

  @Column({ name: 'schema_version', type: 'integer' })
  schemaVersion!: number;

  // cycle timestamp, ms epoch
  @Column({ type: 'integer' })
  @Index()
  timestamp!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
