/** Cookie that carries the access token for browser clients. */
export const ACCESS_TOKEN_COOKIE = 'jwtdown_access_token';

/** The only algorithm tokens are signed with or accepted under. */
export const JWT_ALGORITHM = 'HS256';

/** Value of the `tokenType` field in login responses. */
export const TOKEN_TYPE = 'bearer';

/** Scheme announced in the WWW-Authenticate challenge. */
export const AUTH_CHALLENGE_SCHEME = 'Bearer';
