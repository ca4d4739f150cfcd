import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Principal } from '../../domain/users';

@Entity('users')
export class UserEntity implements Principal {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('uq_users_username', { unique: true })
  @Column({ type: 'varchar', length: 50 })
  username!: string;

  @Index('uq_users_email', { unique: true })
  @Column({ type: 'varchar', length: 100 })
  email!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 50 })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 50 })
  lastName!: string;

  @Column({ name: 'phone_number', type: 'varchar', length: 20 })
  phoneNumber!: string;

  /** Bcrypt hash */
  @Column({ name: 'password_hash', type: 'varchar' })
  passwordHash!: string;

  @Column({ name: 'is_admin', type: 'boolean', default: false })
  isAdmin!: boolean;

  @Column({ name: 'is_subscribed', type: 'boolean', default: false })
  isSubscribed!: boolean;

  @Column({ name: 'subscription_expiry', type: 'timestamptz', nullable: true })
  subscriptionExpiry!: Date | null;

  @Column({ name: 'reset_token', type: 'varchar', nullable: true })
  resetToken!: string | null;

  @Column({ name: 'avatar_url', type: 'varchar', nullable: true })
  avatarUrl!: string | null;

  @Column({ name: 'username_changed_at', type: 'timestamptz', nullable: true })
  usernameChangedAt!: Date | null;

  @Index('idx_users_created_at')
  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz', nullable: true })
  updatedAt!: Date | null;
}
