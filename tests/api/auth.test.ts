import { describe, it, expect } from 'vitest';
import { AuthError, authenticateRequest, verifyJwt } from '../../api/_lib/auth.js';
import { TEST_SECRET, createToken } from './helpers.js';

const NOW_MS = 1_700_000_000_000;
const NOW_SECONDS = 1_700_000_000;
const now = () => NOW_MS;
const config = { jwtSecret: TEST_SECRET };

function authErrorOf(run: () => unknown): AuthError {
  try {
    run();
  } catch (error) {
    if (error instanceof AuthError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an AuthError');
}

describe('verifyJwt', () => {
  it('returns the subject of a valid token', () => {
    const token = createToken({ sub: 'user-42', exp: NOW_SECONDS + 60 });
    expect(verifyJwt(token, config, now)).toEqual({ userId: 'user-42' });
  });

  it('trims the subject', () => {
    expect(verifyJwt(createToken({ sub: '  user-42 ' }), config, now)).toEqual({ userId: 'user-42' });
  });

  it('rejects an expired token', () => {
    const token = createToken({ sub: 'user-42', exp: NOW_SECONDS });
    expect(() => verifyJwt(token, config, now)).toThrow('Token expired');
  });

  it('rejects a token used before nbf', () => {
    const token = createToken({ sub: 'user-42', nbf: NOW_SECONDS + 1 });
    expect(() => verifyJwt(token, config, now)).toThrow('Token not yet valid');
  });

  it('rejects a token signed with another secret', () => {
    const token = createToken({ sub: 'user-42' }, 'other-secret');
    expect(() => verifyJwt(token, config, now)).toThrow('Invalid token signature');
  });

  it('rejects algorithms other than HS256', () => {
    const token = createToken({ sub: 'user-42' }, TEST_SECRET, { alg: 'none' });
    expect(() => verifyJwt(token, config, now)).toThrow("Unsupported token algorithm 'none'");
  });

  it('rejects a token without three segments', () => {
    expect(() => verifyJwt('abc.def', config, now)).toThrow('Invalid token format');
  });

  it('rejects an undecodable header', () => {
    expect(() => verifyJwt('a.b.c', config, now)).toThrow('Invalid token header');
  });

  it('rejects a token without a subject', () => {
    expect(() => verifyJwt(createToken({ role: 'member' }), config, now)).toThrow('Token subject is missing');
  });

  it('checks issuer and audience when configured', () => {
    const strict = { ...config, issuer: 'https://issuer.example', audience: 'epf-assist' };

    expect(
      verifyJwt(
        createToken({ sub: 'user-42', iss: 'https://issuer.example', aud: ['other', 'epf-assist'] }),
        strict,
        now
      )
    ).toEqual({ userId: 'user-42' });
    expect(() =>
      verifyJwt(createToken({ sub: 'user-42', iss: 'https://evil.example', aud: 'epf-assist' }), strict, now)
    ).toThrow('Invalid token issuer');
    expect(() =>
      verifyJwt(createToken({ sub: 'user-42', iss: 'https://issuer.example', aud: 'other' }), strict, now)
    ).toThrow('Invalid token audience');
  });

  it('fails with 500 when no secret is configured', () => {
    const error = authErrorOf(() => verifyJwt(createToken({ sub: 'user-42' }), {}, now));

    expect(error.message).toBe('Authentication is not configured');
    expect(error.statusCode).toBe(500);
  });

  it('uses 401 for token problems', () => {
    expect(authErrorOf(() => verifyJwt('x', config, now)).statusCode).toBe(401);
  });
});

describe('authenticateRequest', () => {
  it('reads a bearer token case-insensitively', () => {
    const token = createToken({ sub: 'user-42' });
    expect(authenticateRequest({ headers: { authorization: `bearer ${token}` } }, config, now)).toEqual({
      userId: 'user-42',
    });
  });

  it.each([undefined, '', 'Basic dXNlcjpwYXNz', 'Bearer'])('rejects the header %j', (authorization) => {
    expect(() => authenticateRequest({ headers: { authorization } }, config, now)).toThrow('Missing bearer token');
  });
});
