/**
 * Authorization Code Service - HTTP Status Codes
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Redirect back to the client */
    FOUND: 302,
    /** Malformed request syntax or invalid parameters */
    BAD_REQUEST: 400,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
