import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import type { EnvironmentVariables } from '../../config/env.validation';

/**
 * bcrypt hashing with a configurable cost factor.
 *
 * bcrypt embeds a random salt in every hash, and `compare` checks the
 * digest in constant time. Both calls run on the libuv thread pool.
 */
@Injectable()
export class PasswordHasher {
  private readonly saltRounds: number;

  constructor(configService: ConfigService<EnvironmentVariables, true>) {
    this.saltRounds = configService.get('BCRYPT_SALT_ROUNDS', { infer: true });
  }

  hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.saltRounds);
  }

  /** Resolves false on mismatch; never rejects for a wrong password. */
  verify(plaintext: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plaintext, hash);
  }
}
