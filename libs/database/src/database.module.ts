import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { CreateUsers1760000000000 } from './migrations/1760000000000-CreateUsers';
import { UsersRepository } from './repositories/users.repository';
import { TypeOrmUsersRepository } from './repositories/typeorm-users.repository';

/** All entity classes registered in this database library */
const ENTITIES = [User] as const;

/** Schema migrations, oldest first */
const MIGRATIONS = [CreateUsers1760000000000] as const;

/**
 * DatabaseModule — binds the UsersRepository store contract to PostgreSQL.
 *
 * Registered once in the root module. It is global, so feature modules
 * inject UsersRepository without importing it; tests swap it for another
 * global module that provides an in-memory UsersRepository.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [TypeOrmModule.forRootAsync(...), DatabaseModule.forFeature()],
 * })
 * export class AppModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      global: true,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      providers: [
        { provide: UsersRepository, useClass: TypeOrmUsersRepository },
      ],
      exports: [UsersRepository],
    };
  }

  /** Entity classes, for TypeOrmModule.forRoot({ entities }). */
  static get entities(): ReadonlyArray<Function> {
    return ENTITIES;
  }

  /** Migration classes, for TypeOrmModule.forRoot({ migrations }). */
  static get migrations(): ReadonlyArray<Function> {
    return MIGRATIONS;
  }
}
