import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('funding_rates')
@Index(['symbol', 'timestamp'], { unique: true })
export class FundingRateEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar' })
  symbol!: string;

  @Column({ type: 'integer' })
  timestamp!: number;

  @Column({ type: 'real' })
  rate!: number;
}
