import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment schema, validated once at startup by ConfigModule.
 *
 * Missing optional values fall back to the defaults below. A missing
 * JWT_SECRET aborts startup.
 */
export class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: 'development' | 'production' | 'test' = 'development';

  // ── Auth ──────────────────────────────────────────────
  @IsString()
  @IsNotEmpty({ message: 'JWT_SECRET is not defined. Check your .env file.' })
  JWT_SECRET!: string;

  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES: number = 30;

  // Implicit conversion would turn the string "false" into true; read the raw value
  @Transform(({ obj }: { obj: Record<string, unknown> }) => {
    const raw = obj['JWT_EMBED_EXPIRY'];
    return raw === true || raw === 'true';
  })
  @IsBoolean()
  JWT_EMBED_EXPIRY: boolean = false;

  /** bcrypt accepts cost factors 4 through 31 */
  @IsInt()
  @Min(4)
  @Max(31)
  BCRYPT_SALT_ROUNDS: number = 12;

  @IsString()
  @IsNotEmpty()
  AUTH_DEV_ORIGIN_MARKER: string = 'localhost';

  // ── HTTP ──────────────────────────────────────────────
  @IsInt()
  API_GATEWAY_PORT: number = 4000;

  @IsString()
  API_GATEWAY_CORS_ORIGIN: string = 'http://localhost:3000';

  // ── Postgres ──────────────────────────────────────────
  @IsString()
  POSTGRES_HOST: string = 'localhost';

  @IsInt()
  POSTGRES_PORT: number = 5432;

  @IsString()
  POSTGRES_USER: string = 'tokengate';

  @IsString()
  POSTGRES_PASSWORD: string = 'tokengate_secret';

  @IsString()
  POSTGRES_DB: string = 'tokengate';
}

/**
 * ConfigModule `validate` hook: coerces raw strings to the schema's types
 * and throws with every violation listed.
 */
export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
