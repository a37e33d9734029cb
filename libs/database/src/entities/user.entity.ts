import { Entity, PrimaryGeneratedColumn, Column, Unique } from 'typeorm';

/**
 * An account that can log in and receive access tokens.
 *
 * Invariants:
 * - Username must be unique across all users
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Rows are created at signup and never updated by the auth flow
 */
@Entity('users')
@Unique('UQ_users_username', ['username'])
export class User {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  username!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;
}
