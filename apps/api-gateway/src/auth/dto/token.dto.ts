import { IsNotEmpty, IsString } from 'class-validator';

/**
 * A bare token: the body of POST /token/validate and of GET /token.
 */
export class TokenDto {
  @IsString()
  @IsNotEmpty({ message: 'Token is required' })
  token!: string;
}
