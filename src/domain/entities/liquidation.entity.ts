import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('liquidations')
@Index(['symbol', 'timestamp'])
export class LiquidationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar' })
  symbol!: string;

  @Column({ type: 'integer' })
  timestamp!: number;

  @Column({ name: 'usd_amount', type: 'real' })
  usdAmount!: number;

  // LONG or SHORT: the side of the position that was liquidated
  @Column({ type: 'varchar', length: 5 })
  side!: string;

  @Column({ type: 'real', nullable: true })
  price!: number | null;
}
