/**
 * Handler Invocation and Assertion Helpers
 *
 * Helpers for reading Lambda responses the way a client would read the
 * HTTP response.
 */

import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  APIGatewayProxyStructuredResultV2,
} from 'aws-lambda';
import { lambdaContext } from './events';

// =============================================================================
// Types
// =============================================================================

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  scope: string;
}

type Handler = (
  event: APIGatewayProxyEventV2,
  context: ReturnType<typeof lambdaContext>
) => Promise<APIGatewayProxyResultV2>;

// =============================================================================
// Invocation
// =============================================================================

function toHttpResponse(result: APIGatewayProxyResultV2): HttpResponse {
  if (typeof result === 'string') {
    throw new Error(`Expected a structured result, got string: ${result}`);
  }
  const structured: APIGatewayProxyStructuredResultV2 = result;

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(structured.headers ?? {})) {
    headers[name.toLowerCase()] = String(value);
  }

  return {
    status: structured.statusCode ?? 200,
    headers,
    body: structured.body ?? '',
  };
}

/**
 * Invoke a handler with a fresh Lambda context.
 */
export async function invoke(handler: Handler, event: APIGatewayProxyEventV2): Promise<HttpResponse> {
  return toHttpResponse(await handler(event, lambdaContext()));
}

// =============================================================================
// Assertions
// =============================================================================

export function jsonBody(response: HttpResponse): unknown {
  return JSON.parse(response.body);
}

/**
 * Assert an error response carrying exactly `{"error": expectedError}`.
 */
export function assertOAuth2Error(
  response: HttpResponse,
  expectedError: string,
  options: { expectedStatus?: number } = {}
): void {
  const { expectedStatus = 400 } = options;

  if (response.status !== expectedStatus) {
    throw new Error(`Expected status ${expectedStatus}, got ${response.status}. Body: ${response.body}`);
  }

  if (response.headers['location'] !== undefined) {
    throw new Error(`Error response must not redirect, got Location: ${response.headers['location']}`);
  }

  const expectedBody = JSON.stringify({ error: expectedError });
  if (response.body !== expectedBody) {
    throw new Error(`Expected body ${expectedBody}, got ${response.body}`);
  }
}

/**
 * Assert a successful token response and return its body.
 */
export function assertTokenResponse(response: HttpResponse): TokenResponse {
  if (response.status !== 200) {
    throw new Error(`Expected status 200, got ${response.status}. Body: ${response.body}`);
  }

  const data = jsonBody(response);
  if (
    typeof data !== 'object' ||
    data === null ||
    !('access_token' in data) ||
    !('token_type' in data) ||
    !('expires_in' in data) ||
    !('scope' in data)
  ) {
    throw new Error(`Malformed token response: ${response.body}`);
  }

  const { access_token, token_type, expires_in, scope } = data;
  if (
    typeof access_token !== 'string' ||
    typeof token_type !== 'string' ||
    typeof expires_in !== 'number' ||
    typeof scope !== 'string'
  ) {
    throw new Error(`Malformed token response: ${response.body}`);
  }

  return { access_token, token_type, expires_in, scope };
}

/**
 * Assert a 302 and return the parsed Location.
 */
export function parseRedirectLocation(response: HttpResponse): URL {
  if (response.status !== 302) {
    throw new Error(`Expected status 302, got ${response.status}. Body: ${response.body}`);
  }
  const location = response.headers['location'];
  if (!location) {
    throw new Error('Redirect response has no Location header');
  }
  return new URL(location);
}

/**
 * `name=value` pair of a Set-Cookie header, ready for a Cookie header.
 */
export function cookiePair(response: HttpResponse): string {
  const setCookie = response.headers['set-cookie'];
  if (!setCookie) {
    throw new Error('Response sets no cookie');
  }
  return setCookie.split(';')[0];
}

/**
 * Value of the consent form's hidden csrf_token field.
 */
export function csrfTokenOf(response: HttpResponse): string {
  const match = /name="csrf_token" value="([^"]*)"/.exec(response.body);
  if (!match) {
    throw new Error('Consent page has no csrf_token field');
  }
  return match[1];
}
