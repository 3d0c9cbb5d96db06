import { Entity, PrimaryColumn, Column, CreateDateColumn } from 'typeorm';

export const ADMIN_BOOTSTRAP_SLOT = 'admin';

/**
 * Single-row claim on the bootstrap admin role. The primary key makes the
 * first insert win; later registrations insert-ignore against it.
 */
@Entity('admin_bootstrap')
export class AdminBootstrap {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  slot!: string;

  @Column({ name: 'user_id', type: 'int' })
  userId!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
