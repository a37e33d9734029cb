import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import type { EnvironmentVariables } from '../config/env.validation';
import { ACCESS_TOKEN_COOKIE } from './auth.constants';
import { AccessTokenResponseDto, LoginDto, TokenDto } from './dto';
import { InvalidSignatureError, InvalidTokenException } from './exceptions';
import { AuthService } from './services/auth.service';
import type { SignedPayload } from './interfaces';
import { TokenService } from './services/token.service';
import { sessionCookieOptions } from './session-cookie';
import { readAccessTokenCookie } from './strategies/token-sources';

/**
 * TokenController — issues, exposes, checks and clears access tokens.
 *
 * Routes:
 * - POST   /token          → Log in; token in the body and in a cookie (public)
 * - GET    /token          → Echo the cookie token, if any (public)
 * - POST   /token/validate → Signature-only check of a given token (public)
 * - DELETE /token          → Clear the cookie (public, idempotent)
 */
@Controller('token')
export class TokenController {
  private readonly devOriginMarker: string;

  constructor(
    private readonly authService: AuthService,
    private readonly tokenService: TokenService,
    configService: ConfigService<EnvironmentVariables, true>,
  ) {
    this.devOriginMarker = configService.get('AUTH_DEV_ORIGIN_MARKER', {
      infer: true,
    });
  }

  /**
   * @returns 200 OK with `{ accessToken, tokenType: "bearer" }` and the cookie set
   * @throws 401 Unauthorized with a Bearer challenge if credentials are invalid
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Req() request: Request,
    @Res({ passthrough: true }) response: Response,
  ): Promise<AccessTokenResponseDto> {
    const token = await this.authService.login(dto.username, dto.password);

    response.cookie(
      ACCESS_TOKEN_COOKIE,
      token.accessToken,
      sessionCookieOptions(request, this.devOriginMarker),
    );

    return token;
  }

  /**
   * @returns 200 OK with `{ token }` whenever the cookie is sent (even empty),
   *   an empty body otherwise
   */
  @Get()
  readToken(@Req() request: Request): TokenDto | undefined {
    const token = readAccessTokenCookie(request);
    return token === undefined ? undefined : { token };
  }

  /**
   * Answers only "was this signed by us?". No subject or user lookup.
   *
   * Neither `exp` nor `nbf` is enforced here.
   *
   * @returns 200 OK with the decoded payload (raw text if it is not JSON)
   * @throws 422 Unprocessable Entity with `{ detail: "invalid token" }`
   */
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  validate(@Body() dto: TokenDto): SignedPayload {
    try {
      return this.tokenService.verifySignature(dto.token);
    } catch (error) {
      if (error instanceof InvalidSignatureError) {
        throw new InvalidTokenException(error);
      }
      throw error;
    }
  }

  /**
   * Clears the cookie whether or not one was set.
   *
   * @returns 200 OK with an empty body
   */
  @Delete()
  @HttpCode(HttpStatus.OK)
  logout(
    @Req() request: Request,
    @Res({ passthrough: true }) response: Response,
  ): void {
    response.clearCookie(
      ACCESS_TOKEN_COOKIE,
      sessionCookieOptions(request, this.devOriginMarker),
    );
  }
}
