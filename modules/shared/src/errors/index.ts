/**
 * Authorization Code Service - Error Constants Module
 *
 * Wire error codes, HTTP statuses and log messages.
 *
 * @module errors
 */

export {
    AuthorizationErrors,
    TokenErrors,
} from './oauth-error-codes';

export type {
    AuthorizationErrorCode,
    TokenErrorCode,
    OAuthErrorCode,
} from './oauth-error-codes';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export type { ErrorMessageKey } from './error-messages';
