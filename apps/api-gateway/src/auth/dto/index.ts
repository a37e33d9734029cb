export { LoginDto } from './login.dto';
export { SignupDto } from './signup.dto';
export { TokenDto } from './token.dto';
export { AccessTokenResponseDto } from './access-token-response.dto';
export { UserProfileDto } from './user-profile.dto';
