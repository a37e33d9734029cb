import { Global, Module } from '@nestjs/common';
import {
  NewUser,
  User,
  UsernameAlreadyExistsException,
  UsersRepository,
} from '@tokengate/database';

/**
 * UsersRepository held in a Map, enforcing unique usernames the way the
 * `UQ_users_username` constraint does.
 */
export class InMemoryUsersRepository extends UsersRepository {
  private readonly rows = new Map<string, User>();
  private nextId = 1;

  async getUser(username: string): Promise<User | null> {
    return this.rows.get(username) ?? null;
  }

  async createUser(user: NewUser): Promise<void> {
    if (this.rows.has(user.username)) {
      throw new UsernameAlreadyExistsException(user.username);
    }
    this.rows.set(user.username, { id: this.nextId++, ...user });
  }

  delete(username: string): void {
    this.rows.delete(username);
  }
}

/** Stands in for DatabaseModule.forFeature() in tests. */
@Global()
@Module({
  providers: [
    InMemoryUsersRepository,
    { provide: UsersRepository, useExisting: InMemoryUsersRepository },
  ],
  exports: [UsersRepository, InMemoryUsersRepository],
})
export class InMemoryDatabaseModule {}
