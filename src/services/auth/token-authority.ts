import jwt from 'jsonwebtoken';
import type { IdentityStore } from '../identity';
import type { CredentialVault } from './credential-vault';
import { AuthError } from './errors';
import { createChildLogger } from '../../utils/logger';
import type { AccessTokenClaims, ClientMeta, IdentityUser, RefreshTokenRecord } from '../../types/auth';

const log = createChildLogger({ module: 'token-authority' });

export const ACCESS_TOKEN_TTL_SECONDS = 15 * 60;
export const REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;
export const TOKEN_ISSUER = 'knowledgecenter-api';

export interface TokenAuthorityOptions {
    secret: string;
    issuer?: string;
    now?: () => Date;
}

export interface IssuedRefreshToken {
    secret: string;
    record: RefreshTokenRecord;
}

export interface RotationResult {
    user: IdentityUser;
    accessToken: string;
    refreshToken: string;
}

function toSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

function stringClaim(payload: jwt.JwtPayload, key: string): string {
    const value: unknown = payload[key];
    return typeof value === 'string' ? value : '';
}

function numberClaim(payload: jwt.JwtPayload, key: string): number {
    const value: unknown = payload[key];
    return typeof value === 'number' ? value : 0;
}

function rolesClaim(payload: jwt.JwtPayload): string[] {
    const value: unknown = payload.roles;
    if (!Array.isArray(value)) return [];
    return value.filter((role): role is string => typeof role === 'string');
}

/**
 * Issues HS256 access tokens and opaque refresh tokens, validates access
 * tokens, and runs refresh rotation with reuse detection.
 */
export class TokenAuthority {
    private readonly secret: string;
    private readonly issuer: string;
    private readonly now: () => Date;

    constructor(
        private readonly store: IdentityStore,
        private readonly vault: CredentialVault,
        options: TokenAuthorityOptions
    ) {
        if (!options.secret) throw new Error('TokenAuthority requires a signing secret');
        this.secret = options.secret;
        this.issuer = options.issuer ?? TOKEN_ISSUER;
        this.now = options.now ?? (() => new Date());
    }

    // ─── Access tokens ───

    issueAccessToken(user: IdentityUser, roles: string[]): string {
        const iat = toSeconds(this.now());
        const claims: AccessTokenClaims = {
            user_id: user.public_id,
            login_id: user.login_id,
            email: user.email,
            roles,
            jti: this.vault.generateTokenId(),
            iat,
            exp: iat + ACCESS_TOKEN_TTL_SECONDS,
            iss: this.issuer,
        };
        return jwt.sign(claims, this.secret, { algorithm: 'HS256' });
    }

    /**
     * Any failure (malformed, wrong algorithm, bad signature, `exp <= now`)
     * is reported as INVALID_TOKEN. Claims absent from a valid token come
     * back as empty values.
     */
    validateAccessToken(token: string): AccessTokenClaims {
        let payload: string | jwt.JwtPayload;
        try {
            payload = jwt.verify(token, this.secret, {
                algorithms: ['HS256'],
                clockTimestamp: toSeconds(this.now()),
            });
        } catch (err) {
            log.debug({ err: err instanceof Error ? err.message : err }, 'Access token rejected');
            throw new AuthError('INVALID_TOKEN');
        }
        if (typeof payload === 'string') throw new AuthError('INVALID_TOKEN');

        return {
            user_id: stringClaim(payload, 'user_id'),
            login_id: stringClaim(payload, 'login_id'),
            email: stringClaim(payload, 'email'),
            roles: rolesClaim(payload),
            jti: stringClaim(payload, 'jti'),
            iat: numberClaim(payload, 'iat'),
            exp: numberClaim(payload, 'exp'),
            iss: stringClaim(payload, 'iss'),
        };
    }

    // ─── Refresh tokens ───

    async issueRefreshToken(
        userId: number,
        parentTokenId: number | null,
        meta: ClientMeta,
        signal?: AbortSignal
    ): Promise<IssuedRefreshToken> {
        const secret = this.vault.generateRefreshSecret();
        const record = await this.store.createToken(
            {
                user_id: userId,
                token_hash: this.vault.digest(secret),
                expires_at: new Date(this.now().getTime() + REFRESH_TOKEN_TTL_SECONDS * 1000),
                parent_token_id: parentTokenId,
                client_ip: meta.clientIp || null,
                user_agent: meta.userAgent || null,
            },
            signal
        );
        return { secret, record };
    }

    /**
     * Exchanges a refresh secret for a new access token and a new refresh
     * secret. Presenting an already revoked secret revokes every refresh
     * token the user holds.
     */
    async rotate(secret: string, meta: ClientMeta, signal?: AbortSignal): Promise<RotationResult> {
        const current = await this.store.findTokenByHash(this.vault.digest(secret), signal);
        if (!current) throw new AuthError('INVALID_TOKEN');

        if (current.is_revoked) {
            log.warn({ userId: current.user_id, tokenId: current.id }, 'Refresh token reuse detected; revoking all sessions');
            try {
                await this.store.revokeAllUserTokens(current.user_id, signal);
            } catch (err) {
                // the caller is rejected either way
                log.error({ err, userId: current.user_id }, 'Failed to revoke sessions after refresh token reuse');
            }
            throw new AuthError('TOKEN_REVOKED');
        }

        if (this.now().getTime() > current.expires_at.getTime()) {
            throw new AuthError('TOKEN_EXPIRED');
        }

        // A soft-deleted owner leaves nothing to refresh into
        const user = await this.store.findUserById(current.user_id, signal);
        if (!user) throw new AuthError('INVALID_TOKEN');
        const roles = await this.store.getEffectiveRoles(user.id, signal);

        const accessToken = this.issueAccessToken(user, roles);
        // The successor must exist before its predecessor is marked replaced
        const next = await this.issueRefreshToken(user.id, current.id, meta, signal);
        await this.store.markTokenReplaced(current.id, next.record.id, signal);

        return { user, accessToken, refreshToken: next.secret };
    }

    async revoke(secret: string, signal?: AbortSignal): Promise<void> {
        const record = await this.store.findTokenByHash(this.vault.digest(secret), signal);
        if (!record) return;
        await this.store.revokeToken(record.id, signal);
    }

    async revokeAll(userId: number, signal?: AbortSignal): Promise<void> {
        await this.store.revokeAllUserTokens(userId, signal);
    }
}
