/**
 * Authorization Code Service - Redemption Rules
 *
 * The checks a code must pass before it is claimed. Shared by every
 * AuthorizationCodeStore implementation so they classify failures alike.
 *
 * @module storage/redemption
 */

import type { RedeemableCode, RedeemFailureReason } from '../../../shared_types/api';
import type { AuthCodeItem } from '../../../shared_types/schema';
import { parseScopes } from '../validation/scope-utils';
import { isoToEpoch } from './types';

/**
 * Decide whether `item` may be redeemed by `clientId` for `redirectUri`.
 *
 * @returns null when redeemable, otherwise the first failed check
 */
export function classifyRedemption(
    item: AuthCodeItem | null,
    clientId: string,
    redirectUri: string,
    now: number
): RedeemFailureReason | null {
    if (!item) {
        return 'not_found';
    }
    if (item.clientId !== clientId) {
        return 'client_mismatch';
    }
    if (item.ttl <= now) {
        return 'expired';
    }
    if (item.used) {
        return 'already_used';
    }
    if (item.redirectUri !== redirectUri) {
        return 'redirect_mismatch';
    }
    return null;
}

export function toRedeemableCode(item: AuthCodeItem): RedeemableCode {
    return {
        code: item.code,
        clientId: item.clientId,
        scopes: parseScopes(item.scope),
        redirectUri: item.redirectUri,
        issuedAt: isoToEpoch(item.issuedAt),
        expiresAt: item.ttl,
    };
}
