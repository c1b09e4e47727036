/**
 * HS256 access tokens
 * Signing and verification with a shared secret, on hono/jwt
 */

import { decode, sign, verify } from 'hono/jwt';
import type { JWTPayload } from 'hono/utils/jwt/types';
import {
  JwtTokenExpired,
  JwtTokenInvalid,
  JwtTokenIssuedAt,
  JwtTokenNotBefore,
  JwtTokenSignatureMismatched,
} from 'hono/utils/jwt/types';

import type { Result } from '@/types/index.js';
import { denied, success } from '@/types/index.js';

export type TokenClaims = Record<string, unknown>;

/**
 * Anything that can turn a raw token into verified claims
 */
export interface TokenVerifier {
  verify(token: string): Promise<Result<TokenClaims>>;
}

export interface SignOptions {
  expiresInSeconds?: number;
  now?: Date;
}

function isClaimsObject(value: unknown): value is TokenClaims {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Issue a signed token. iat is always set; exp only when requested.
 */
export async function signAccessToken(
  claims: TokenClaims,
  secret: string,
  options: SignOptions = {}
): Promise<string> {
  const issuedAt = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const payload: JWTPayload = { iat: issuedAt };
  Object.assign(payload, claims);
  if (options.expiresInSeconds !== undefined) {
    payload.exp = issuedAt + options.expiresInSeconds;
  }
  return sign(payload, secret, 'HS256');
}

/**
 * Verify algorithm, signature and time claims, returning the payload.
 * Time claims are checked against the system clock.
 */
export async function verifyAccessToken(
  token: string,
  secret: string
): Promise<Result<TokenClaims>> {
  if (token.split('.').length !== 3) {
    return denied('Malformed token');
  }

  let algorithm: string;
  try {
    algorithm = decode(token).header.alg;
  } catch {
    return denied('Malformed token');
  }
  // verify() signs with the algorithm it is given, whatever the header says
  if (algorithm !== 'HS256') {
    return denied('Unsupported token algorithm');
  }

  let payload: unknown;
  try {
    payload = await verify(token, secret, 'HS256');
  } catch (error) {
    if (error instanceof JwtTokenSignatureMismatched) {
      return denied('Invalid token signature');
    }
    if (error instanceof JwtTokenExpired) {
      return denied('Token expired');
    }
    if (error instanceof JwtTokenNotBefore) {
      return denied('Token not yet valid');
    }
    if (error instanceof JwtTokenIssuedAt) {
      return denied('Token issued in the future');
    }
    if (error instanceof JwtTokenInvalid) {
      return denied('Malformed token');
    }
    return denied('Invalid token');
  }

  if (!isClaimsObject(payload)) {
    return denied('Malformed token payload');
  }
  return success(payload);
}

/**
 * Default verifier used by the bearer authenticator
 */
export function createHs256TokenVerifier(secret: string): TokenVerifier {
  return {
    verify(token: string): Promise<Result<TokenClaims>> {
      return verifyAccessToken(token, secret);
    },
  };
}
