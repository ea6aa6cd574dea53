/**
 * Bearer Token Authentication
 *
 * Verifies HS256 JWTs and yields the caller's user id (the `sub` claim).
 */

import crypto from 'node:crypto';
import type { VercelRequest } from '@vercel/node';
import { z } from 'zod';
import type { AppConfig } from '@epf-assist/lib';

export class AuthError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 401) {
    super(message);
    this.name = 'AuthError';
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthError);
    }
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

export type AuthConfig = AppConfig['auth'];

export interface AuthenticatedUser {
  userId: string;
}

const JwtHeaderSchema = z.object({
  alg: z.string().optional(),
  typ: z.string().optional(),
});

const JwtPayloadSchema = z
  .object({
    sub: z.unknown().optional(),
    iss: z.unknown().optional(),
    aud: z.unknown().optional(),
    exp: z.unknown().optional(),
    nbf: z.unknown().optional(),
  })
  .passthrough();

type JwtPayload = z.infer<typeof JwtPayloadSchema>;

function base64UrlDecode(value: string): string {
  const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
  const paddingLength = (4 - (normalized.length % 4)) % 4;
  return Buffer.from(normalized + '='.repeat(paddingLength), 'base64').toString('utf8');
}

export function base64UrlEncode(value: Buffer | string): string {
  return Buffer.from(value)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

function parseSegment<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  let json: unknown;
  try {
    json = JSON.parse(base64UrlDecode(raw));
  } catch {
    throw new AuthError(`Invalid token ${label}`);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new AuthError(`Invalid token ${label}`);
  }
  return parsed.data;
}

function timingSafeEqualText(a: string, b: string): boolean {
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) {
    return false;
  }
  return crypto.timingSafeEqual(aBuf, bBuf);
}

export function signHs256(signingInput: string, secret: string): string {
  return base64UrlEncode(crypto.createHmac('sha256', secret).update(signingInput).digest());
}

function ensureTimeWindow(payload: JwtPayload, nowMs: number): void {
  const nowSeconds = Math.floor(nowMs / 1000);
  if (typeof payload.nbf === 'number' && payload.nbf > nowSeconds) {
    throw new AuthError('Token not yet valid');
  }
  if (typeof payload.exp === 'number' && payload.exp <= nowSeconds) {
    throw new AuthError('Token expired');
  }
}

function ensureIssuer(payload: JwtPayload, issuer: string | undefined): void {
  if (issuer && payload.iss !== issuer) {
    throw new AuthError('Invalid token issuer');
  }
}

function ensureAudience(payload: JwtPayload, audience: string | undefined): void {
  if (!audience) {
    return;
  }
  const aud = payload.aud;
  if (typeof aud === 'string' ? aud === audience : Array.isArray(aud) && aud.includes(audience)) {
    return;
  }
  throw new AuthError('Invalid token audience');
}

/**
 * Verify a compact HS256 token.
 *
 * @throws {AuthError} 401 for any invalid token, 500 when no secret is configured
 */
export function verifyJwt(
  token: string,
  config: AuthConfig,
  now: () => number = Date.now
): AuthenticatedUser {
  if (!config.jwtSecret) {
    throw new AuthError('Authentication is not configured', 500);
  }

  const parts = token.split('.');
  const [headerPart, payloadPart, signaturePart] = parts;
  if (parts.length !== 3 || !headerPart || !payloadPart || !signaturePart) {
    throw new AuthError('Invalid token format');
  }

  const header = parseSegment(headerPart, JwtHeaderSchema, 'header');
  const payload = parseSegment(payloadPart, JwtPayloadSchema, 'payload');

  if (header.alg !== 'HS256') {
    throw new AuthError(`Unsupported token algorithm '${header.alg ?? 'unknown'}'`);
  }

  const expected = signHs256(`${headerPart}.${payloadPart}`, config.jwtSecret);
  if (!timingSafeEqualText(signaturePart, expected)) {
    throw new AuthError('Invalid token signature');
  }

  ensureTimeWindow(payload, now());
  ensureIssuer(payload, config.issuer);
  ensureAudience(payload, config.audience);

  const userId = typeof payload.sub === 'string' ? payload.sub.trim() : '';
  if (!userId) {
    throw new AuthError('Token subject is missing');
  }

  return { userId };
}

/**
 * Read and verify the bearer token of a request.
 *
 * @throws {AuthError}
 */
export function authenticateRequest(
  req: Pick<VercelRequest, 'headers'>,
  config: AuthConfig,
  now?: () => number
): AuthenticatedUser {
  const header = req.headers.authorization;
  const match = header ? /^Bearer\s+(\S+)$/i.exec(header.trim()) : null;
  const token = match?.[1];
  if (!token) {
    throw new AuthError('Missing bearer token');
  }
  return verifyJwt(token, config, now);
}
