import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

/**
 * DTO for account creation.
 *
 * `full_name` and `disabled` are accepted for client compatibility but are
 * not stored. `email` is free text.
 */
export class SignupDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  @MaxLength(255, { message: 'Username must be at most 255 characters long' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255, { message: 'Email must be at most 255 characters long' })
  email?: string;

  @IsOptional()
  @IsString()
  full_name?: string;

  @IsOptional()
  @IsBoolean()
  disabled?: boolean;
}
