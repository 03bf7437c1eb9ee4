import { Entity, Column, PrimaryColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';

@Entity('trading_days')
export class TradingDayEntity {
  @PrimaryColumn({ type: 'date' })
  date!: string; // YYYY-MM-DD

  @Column({ type: 'varchar', length: 8, nullable: true })
  open_time_local!: string | null; // HH:MM:SS hora del Este

  @Column({ type: 'varchar', length: 8, nullable: true })
  close_time_local!: string | null;

  @Column({ type: 'boolean' })
  is_open!: boolean;

  @Column({ type: 'boolean', default: false })
  is_early_close!: boolean;

  @Column({ type: 'varchar', length: 100, nullable: true })
  holiday_name!: string | null;

  @Column({ type: 'varchar', length: 255 })
  notes!: string;

  // Se conserva entre regeneraciones; updated_at avanza en cada una
  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
