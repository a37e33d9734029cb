import type { User } from '../entities/user.entity';

/** Fields required to insert a user row. */
export interface NewUser {
  username: string;
  passwordHash: string;
  email: string | null;
}

/**
 * Store contract the auth flow depends on.
 *
 * Declared as an abstract class so it doubles as the Nest injection token.
 * Implementations own uniqueness enforcement: `createUser` must reject when
 * the username is taken.
 */
export abstract class UsersRepository {
  abstract getUser(username: string): Promise<User | null>;

  abstract createUser(user: NewUser): Promise<void>;
}
