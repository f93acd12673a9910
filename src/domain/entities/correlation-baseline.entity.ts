import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

@Entity('correlation_baselines')
export class CorrelationBaselineEntity {
  // Unordered pair key, e.g. "BTC/USDT:ETH/USDT"
  @PrimaryColumn({ type: 'varchar' })
  pair!: string;

  @Column({ type: 'real' })
  value!: number;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
