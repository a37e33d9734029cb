// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Store contract ──────────────────────────────────────────
export { UsersRepository } from './repositories/users.repository';
export type { NewUser } from './repositories/users.repository';
export { TypeOrmUsersRepository } from './repositories/typeorm-users.repository';
export { UsernameAlreadyExistsException } from './exceptions/username-already-exists.exception';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
