import { TOKEN_TYPE } from '../auth.constants';

/**
 * Login response, following the OAuth2 token response convention.
 */
export class AccessTokenResponseDto {
  accessToken: string;
  tokenType: typeof TOKEN_TYPE;

  constructor(accessToken: string) {
    this.accessToken = accessToken;
    this.tokenType = TOKEN_TYPE;
  }
}
