import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { CombinedReport } from '../types/results.types';

@Entity('cycle_reports')
export class CycleReportEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'cycle_timestamp', type: 'integer' })
  @Index()
  cycleTimestamp!: number;

  @Column({ type: 'simple-json' })
  report!: CombinedReport;

  @Column({ name: 'schema_version', type: 'integer' })
  schemaVersion!: number;

  @Column({ name: 'event_count', type: 'integer', default: 0 })
  eventCount!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
