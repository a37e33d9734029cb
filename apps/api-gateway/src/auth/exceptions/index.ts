export { UnauthenticatedException } from './unauthenticated.exception';
export { InvalidTokenException } from './invalid-token.exception';
export { InvalidSignatureError } from './invalid-signature.error';
