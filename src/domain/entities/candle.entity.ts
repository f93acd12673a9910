import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('candles')
@Index(['symbol', 'timeframe', 'openTime'], { unique: true })
export class CandleEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar' })
  symbol!: string;

  @Column({ type: 'varchar', length: 4 })
  timeframe!: string;

  // ms epoch
  @Column({ name: 'open_time', type: 'integer' })
  openTime!: number;

  @Column({ type: 'real' })
  open!: number;

  @Column({ type: 'real' })
  high!: number;

  @Column({ type: 'real' })
  low!: number;

  @Column({ type: 'real' })
  close!: number;

  @Column({ type: 'real', default: 0 })
  volume!: number;
}
