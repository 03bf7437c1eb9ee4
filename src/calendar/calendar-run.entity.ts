import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

// Log de solo inserción: una fila por ejecución del refresco del calendario
@Entity('calendar_runs')
@Index(['ran_at'])
export class CalendarRunEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  ran_at!: Date;

  @Column({ type: 'varchar', length: 20 })
  status!: string; // 'success' | 'failed'

  @Column({ type: 'varchar', length: 100 })
  source!: string;

  @Column({ type: 'simple-json', nullable: true })
  payload!: Record<string, unknown> | null;
}
