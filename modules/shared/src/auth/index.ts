/**
 * Client Authentication Utilities
 *
 * @module shared/auth
 */

export {
    authenticateClient,
    extractClientCredentials,
    verifyClientSecret,
} from './client-auth';

export type {
    ClientAuthMethod,
    ClientCredentials,
    ClientAuthResult,
} from './client-auth';
