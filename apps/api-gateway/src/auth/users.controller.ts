import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthService } from './services/auth.service';
import { SignupDto, UserProfileDto } from './dto';
import { JwtAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * UsersController — account creation and the caller's own profile.
 *
 * Routes:
 * - POST /api/users → Create an account (public)
 * - GET  /users/me  → Current user, from bearer header or cookie (protected)
 */
@Controller()
export class UsersController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 201 Created with an empty body
   * @throws 409 Conflict if the username is taken
   * @throws 400 Bad Request if validation fails
   */
  @Post('api/users')
  @HttpCode(HttpStatus.CREATED)
  async signup(@Body() dto: SignupDto): Promise<void> {
    await this.authService.signup(dto);
  }

  /**
   * @returns 200 OK with `{ id, username, email }`
   * @throws 401 Unauthorized if no token resolves to a user
   */
  @Get('users/me')
  @UseGuards(JwtAuthGuard)
  readMe(@CurrentUser() user: RequestUser): UserProfileDto {
    return UserProfileDto.fromEntity(user);
  }
}
