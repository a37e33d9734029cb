import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from '../entities/user.entity';
import { UsernameAlreadyExistsException } from '../exceptions/username-already-exists.exception';
import { NewUser, UsersRepository } from './users.repository';

/** SQLSTATE raised by PostgreSQL for a unique constraint violation. */
const PG_UNIQUE_VIOLATION = '23505';

/**
 * PostgreSQL-backed UsersRepository.
 *
 * Relies on the `UQ_users_username` constraint for duplicate detection
 * rather than a read-before-write, so concurrent signups cannot both win.
 */
@Injectable()
export class TypeOrmUsersRepository extends UsersRepository {
  constructor(
    @InjectRepository(User)
    private readonly users: Repository<User>,
  ) {
    super();
  }

  async getUser(username: string): Promise<User | null> {
    return this.users.findOne({ where: { username } });
  }

  async createUser(user: NewUser): Promise<void> {
    try {
      await this.users.insert(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UsernameAlreadyExistsException(user.username, error);
      }
      throw error;
    }
  }
}

function isUniqueViolation(error: unknown): error is QueryFailedError {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
