import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import type { EnvironmentVariables } from '../config/env.validation';
import { BearerChallengeFilter } from './filters/bearer-challenge.filter';
import { jwtModuleOptions } from './jwt-options';
import { AuthService } from './services/auth.service';
import { PasswordHasher } from './services/password-hasher.service';
import { TokenService } from './services/token.service';
import { JwtStrategy } from './strategies/jwt.strategy';
import { TokenController } from './token.controller';
import { UsersController } from './users.controller';

/**
 * AuthModule — encapsulates all authentication concerns.
 *
 * Provides:
 * - bcrypt password hashing
 * - HS256 token issuance and verification
 * - Passport JWT strategy reading the bearer header, then the cookie
 * - REST endpoints for login/logout/signup/profile/validate
 * - the Bearer challenge on every 401 it raises
 *
 * Depends on a UsersRepository from a global module (DatabaseModule in
 * production, an in-memory one in tests).
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'jwt' }),

    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        jwtModuleOptions({
          JWT_SECRET: configService.get('JWT_SECRET', { infer: true }),
          JWT_EMBED_EXPIRY: configService.get('JWT_EMBED_EXPIRY', {
            infer: true,
          }),
          ACCESS_TOKEN_EXPIRE_MINUTES: configService.get(
            'ACCESS_TOKEN_EXPIRE_MINUTES',
            { infer: true },
          ),
        }),
    }),
  ],
  controllers: [TokenController, UsersController],
  providers: [
    AuthService,
    PasswordHasher,
    TokenService,
    JwtStrategy,
    { provide: APP_FILTER, useClass: BearerChallengeFilter },
  ],
  exports: [AuthService, TokenService, PassportModule],
})
export class AuthModule {}
