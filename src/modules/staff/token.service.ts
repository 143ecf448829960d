import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { RevokedTokenStore } from './revoked-token.store';
import { AppConfig } from '../../connections/config/app.config';
import { Staff } from '../../connections/db/models';
import { STAFF_ROLES } from '../../constants';
import { AuthenticationError } from '../../utils/errors';

export const TOKEN_TYPE = {
  ACCESS: 'access',
  REFRESH: 'refresh',
} as const;

export type TokenType = typeof TOKEN_TYPE[keyof typeof TOKEN_TYPE];

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(STAFF_ROLES),
  token_type: z.enum([TOKEN_TYPE.ACCESS, TOKEN_TYPE.REFRESH]),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

export interface SessionTokens {
  access: string;
  refresh: string;
}

/**
 * HS256 session credentials. Refresh tokens can be revoked; access tokens
 * simply run out.
 */
export class TokenService {
  constructor(
    private readonly jwtConfig: AppConfig['jwt'],
    private readonly revoked: RevokedTokenStore,
    private readonly nowSeconds: () => number = () => Math.floor(Date.now() / 1000)
  ) {}

  issuePair(staff: Pick<Staff, 'id' | 'role'>): SessionTokens {
    return {
      access: this.sign(staff, TOKEN_TYPE.ACCESS, this.jwtConfig.accessTtlSeconds),
      refresh: this.sign(staff, TOKEN_TYPE.REFRESH, this.jwtConfig.refreshTtlSeconds),
    };
  }

  issueAccess(staff: Pick<Staff, 'id' | 'role'>): string {
    return this.sign(staff, TOKEN_TYPE.ACCESS, this.jwtConfig.accessTtlSeconds);
  }

  /**
   * Throws the jsonwebtoken error for bad signatures and expiry,
   * AuthenticationError for a token of the wrong type or shape.
   */
  verify(token: string, expectedType: TokenType): TokenClaims {
    const decoded = jwt.verify(token, this.jwtConfig.secret, { algorithms: ['HS256'] });
    const parsed = claimsSchema.safeParse(decoded);

    if (!parsed.success) {
      throw new AuthenticationError('Malformed token');
    }
    if (parsed.data.token_type !== expectedType) {
      throw new AuthenticationError(`Expected a ${expectedType} token`);
    }
    return parsed.data;
  }

  async verifyRefresh(token: string): Promise<TokenClaims> {
    const claims = this.verify(token, TOKEN_TYPE.REFRESH);
    if (await this.revoked.isRevoked(claims.jti)) {
      throw new AuthenticationError('Refresh token has been revoked');
    }
    return claims;
  }

  async revoke(claims: TokenClaims): Promise<void> {
    await this.revoked.revoke(claims.jti, claims.exp - this.nowSeconds());
  }

  private sign(staff: Pick<Staff, 'id' | 'role'>, tokenType: TokenType, ttlSeconds: number): string {
    return jwt.sign(
      { sub: staff.id, role: staff.role, token_type: tokenType, jti: uuidv4() },
      this.jwtConfig.secret,
      { algorithm: 'HS256', expiresIn: ttlSeconds }
    );
  }
}
