import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { Cadence, Tone } from '../../interfaces/user-account.interface';
import { ACCOUNTS_TABLE_PREFIX } from './constants';
import { bigintNumberTransformer, epochMillisTransformer } from './transformers';

@Entity(`${ACCOUNTS_TABLE_PREFIX}users`)
export class UserAccountEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Provider-unique user id - kept in clear for the unique index
  @Index('idx_gha_users_github_id', { unique: true })
  @Column({ type: 'bigint', transformer: bigintNumberTransformer })
  github_id!: number;

  @Column({ type: 'varchar' })
  username!: string;

  @Column({ type: 'varchar', nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', nullable: true })
  name!: string | null;

  @Column({ type: 'varchar', nullable: true })
  avatar_url!: string | null;

  @Column({ type: 'integer', nullable: true })
  public_repos!: number | null;

  @Column({ type: 'integer', nullable: true })
  private_repos!: number | null;

  @Column({ type: 'integer', nullable: true })
  followers!: number | null;

  @Column({ type: 'integer', nullable: true })
  following!: number | null;

  @Column({ type: 'varchar', default: 'weekly' })
  cadence!: Cadence;

  @Column({ type: 'varchar', default: 'formal' })
  tone!: Tone;

  @Column({ type: 'boolean', default: false })
  emojis!: boolean;

  @Column({ type: 'boolean', default: true })
  hashtags!: boolean;

  // Ciphertext only (iv:authTag:data)
  @Column({ type: 'text' })
  encrypted_access_token!: string;

  @Column({
    type: 'bigint',
    nullable: true,
    transformer: epochMillisTransformer,
  })
  token_expires_at!: Date | null;

  @Column({ type: 'text', nullable: true })
  encrypted_refresh_token!: string | null;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
