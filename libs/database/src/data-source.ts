import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { User } from './entities/user.entity';
import { CreateUsers1760000000000 } from './migrations/1760000000000-CreateUsers';

/**
 * Load env vars from the project root .env file.
 * Supports running from the compiled dist/ tree and from libs/database/.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations
 * (`typeorm migration:run` / `migration:revert`).
 *
 * Reads database credentials from environment variables with dev defaults.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'tokengate',
  password: process.env['POSTGRES_PASSWORD'] || 'tokengate_secret',
  database: process.env['POSTGRES_DB'] || 'tokengate',
  entities: [User],
  migrations: [CreateUsers1760000000000],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
