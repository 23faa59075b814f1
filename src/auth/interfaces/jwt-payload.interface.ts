/**
 * Claims carried by an access token. The role is not among them: it is
 * looked up from `sub` on every request.
 */
export interface JwtPayload {
  /** Account id, as a decimal string per the JWT `sub` convention. */
  sub: string;
  iat?: number;
  exp?: number;
  jti?: string;
}
