export type {
  AccessTokenClaims,
  SignedPayload,
} from './access-token-claims.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
