import { Injectable, Logger } from '@nestjs/common';
import { UsersRepository } from '@tokengate/database';
import type { User } from '@tokengate/database';
import { AccessTokenResponseDto, SignupDto } from '../dto';
import { UnauthenticatedException } from '../exceptions';
import { PasswordHasher } from './password-hasher.service';
import { TokenService } from './token.service';

/**
 * AuthService — credential checks, login and signup.
 *
 * Security considerations:
 * - authenticate() spends a bcrypt round even for unknown usernames so
 *   response time does not reveal which usernames exist
 * - login failures all surface as the same UnauthenticatedException
 * - passwords and tokens are never logged
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersRepository: UsersRepository,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenService: TokenService,
  ) {}

  /**
   * Look the user up and check the password.
   *
   * @returns the user on success, null for an unknown user or a wrong password
   */
  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.usersRepository.getUser(username);

    if (!user) {
      await this.passwordHasher.hash(password);
      return null;
    }

    const isPasswordValid = await this.passwordHasher.verify(
      password,
      user.passwordHash,
    );

    return isPasswordValid ? user : null;
  }

  /**
   * Authenticate and issue an access token whose subject is the username.
   *
   * @throws UnauthenticatedException if the credentials do not match
   */
  async login(username: string, password: string): Promise<AccessTokenResponseDto> {
    const user = await this.authenticate(username, password);

    if (!user) {
      this.logger.debug('Login rejected');
      throw new UnauthenticatedException();
    }

    this.logger.log(`User logged in: ${user.id} (${user.username})`);

    const accessToken = this.tokenService.issue({ sub: user.username });
    return new AccessTokenResponseDto(accessToken);
  }

  /**
   * Hash the password and hand the row to the store.
   *
   * Username uniqueness is the store's job: a duplicate surfaces as whatever
   * the repository throws.
   */
  async signup(dto: SignupDto): Promise<void> {
    const passwordHash = await this.passwordHasher.hash(dto.password);

    await this.usersRepository.createUser({
      username: dto.username,
      passwordHash,
      email: dto.email ?? null,
    });

    this.logger.log(`User registered: ${dto.username}`);
  }
}
