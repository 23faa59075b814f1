import { JwtService } from '@nestjs/jwt';
import {
  TokenExpiredException,
  TokenInvalidException,
  TokenMissingException,
} from './exceptions';
import type { JwtPayload } from './interfaces/jwt-payload.interface';
import { TokenService, extractBearerToken } from './token.service';

describe('TokenService', () => {
  const t0 = new Date('2026-01-01T00:00:00Z');
  let service: TokenService;

  beforeEach(() => {
    jest.useFakeTimers({ now: t0 });
    service = new TokenService(
      new JwtService({ secret: 'test-secret', signOptions: { expiresIn: 3600 } }),
    );
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('round-trips the subject id', () => {
    const token = service.issue(42);
    expect(service.verify(token)).toBe(42);
  });

  it('never issues the same token twice', () => {
    expect(service.issue(42)).not.toBe(service.issue(42));
  });

  it('carries sub, iat, exp and jti claims with a one hour window', () => {
    const claims = new JwtService().decode<JwtPayload>(service.issue(7));
    const iat = Math.floor(t0.getTime() / 1000);

    expect(claims.sub).toBe('7');
    expect(claims.iat).toBe(iat);
    expect(claims.exp).toBe(iat + 3600);
    expect(typeof claims.jti).toBe('string');
  });

  it('accepts a token one second before expiry', () => {
    const token = service.issue(1);
    jest.setSystemTime(t0.getTime() + 3599 * 1000);
    expect(service.verify(token)).toBe(1);
  });

  it('rejects a token at t0 + 1h as expired', () => {
    const token = service.issue(1);
    jest.setSystemTime(t0.getTime() + 3600 * 1000);
    expect(() => service.verify(token)).toThrow(TokenExpiredException);
  });

  it('reports a missing token', () => {
    expect(() => service.verify(undefined)).toThrow(TokenMissingException);
    expect(() => service.verify('')).toThrow(TokenMissingException);
  });

  it('rejects a token signed with another key', () => {
    const foreign = new JwtService({ secret: 'other-secret' }).sign({ sub: '1' });
    expect(() => service.verify(foreign)).toThrow(TokenInvalidException);
  });

  it('rejects garbage', () => {
    expect(() => service.verify('not-a-token')).toThrow(TokenInvalidException);
  });

  it('rejects a subject that is not a positive integer', () => {
    const signer = new JwtService({ secret: 'test-secret' });
    expect(() => service.verify(signer.sign({ sub: 'abc' }))).toThrow(
      TokenInvalidException,
    );
    expect(() => service.verify(signer.sign({ sub: '0' }))).toThrow(
      TokenInvalidException,
    );
  });
});

describe('extractBearerToken', () => {
  it('returns undefined without a header', () => {
    expect(extractBearerToken(undefined)).toBeUndefined();
  });

  it('takes the token from a Bearer header, case-insensitively', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(extractBearerToken('bearer abc')).toBe('abc');
  });

  it('returns an empty string for any other scheme', () => {
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBe('');
    expect(extractBearerToken('Bearer')).toBe('');
  });
});
