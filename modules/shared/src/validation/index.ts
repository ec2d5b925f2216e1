/**
 * Authorization Code Service - Validation Module
 *
 * @module validation
 */

export {
    isPresent,
    isValidClientId,
    isValidRedirectUri,
    isValidState,
} from './oauth-params';

export type { RedirectUriPolicy } from './oauth-params';

export {
    parseScopes,
    parseScopeParameter,
    joinScopes,
} from './scope-utils';
