import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Creates the users table backing the auth store.
 *
 * Hand-written to match the User entity, since migration:generate needs a
 * running database connection.
 */
export class CreateUsers1760000000000 implements MigrationInterface {
  name = 'CreateUsers1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "username"      varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "email"         varchar(255),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_username" UNIQUE ("username")
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
