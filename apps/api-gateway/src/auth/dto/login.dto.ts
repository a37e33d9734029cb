import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Login form, shaped like an OAuth2 password-grant request so standard
 * OAuth2 clients can post to it unchanged.
 *
 * Only presence is checked here; the credential check happens in
 * AuthService so every failure looks the same.
 */
export class LoginDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;

  // ── OAuth2 password-grant fields, accepted and ignored ──

  @IsOptional()
  @IsIn(['password'])
  grant_type?: string;

  @IsOptional()
  @IsString()
  scope?: string;

  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;
}
