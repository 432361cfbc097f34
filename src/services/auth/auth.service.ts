import { z } from 'zod';
import type { IdentityStore } from '../identity';
import type { CredentialVault } from './credential-vault';
import { ACCESS_TOKEN_TTL_SECONDS, TokenAuthority } from './token-authority';
import { AuthError } from './errors';
import { createChildLogger } from '../../utils/logger';
import {
    PUBLIC_GROUP_ID,
    type ClientMeta,
    type IdentityUser,
    type LoginResponse,
    type MeResponse,
    type RegisterResponse,
    type TokenResponse,
    type UserInfo,
    type WithRefreshToken,
} from '../../types/auth';

const log = createChildLogger({ module: 'auth' });

// ─── Validation Schemas ───

const emailSchema = z
    .string()
    .min(3)
    .max(254)
    .regex(/^.+@.+\..+$/);

const nameSchema = z
    .record(z.string(), z.string())
    .refine((name) => Object.keys(name).length > 0);

const passwordSchema = z.string().refine((password) => Buffer.byteLength(password, 'utf8') >= 8);

export interface RegisterInput {
    email: string;
    password: string;
    /** Locale-keyed display name; validated here, so arrives untyped */
    name?: unknown;
    login_id?: string | null;
}

export interface LoginInput {
    login_id: string;
    password: string;
}

export function toUserInfo(user: IdentityUser): UserInfo {
    return {
        id: user.public_id,
        login_id: user.login_id,
        name: user.name,
        email: user.email,
    };
}

function bearer(accessToken: string): TokenResponse {
    return { access_token: accessToken, token_type: 'Bearer', expires_in: ACCESS_TOKEN_TTL_SECONDS };
}

/**
 * Register, login, refresh and logout flows over an identity store.
 * Failures the caller can act on are thrown as `AuthError`; anything else
 * (store outages, RNG failure) propagates untouched.
 */
export class AuthService {
    constructor(
        private readonly store: IdentityStore,
        private readonly vault: CredentialVault,
        private readonly tokens: TokenAuthority
    ) {}

    // ─── Register ───

    async register(
        input: RegisterInput,
        meta: ClientMeta,
        signal?: AbortSignal
    ): Promise<WithRefreshToken<RegisterResponse>> {
        if (!emailSchema.safeParse(input.email).success) throw new AuthError('INVALID_EMAIL');
        const name = nameSchema.safeParse(input.name);
        if (!name.success) throw new AuthError('INVALID_NAME');
        if (!passwordSchema.safeParse(input.password).success) throw new AuthError('INVALID_PASSWORD');

        if (await this.store.findUserByEmail(input.email, signal)) {
            throw new AuthError('EMAIL_EXISTS');
        }

        const loginId = input.login_id ? input.login_id : input.email;
        if (await this.store.findUserByLoginId(loginId, signal)) {
            throw new AuthError('LOGIN_ID_EXISTS');
        }

        const passwordHash = await this.vault.hashPassword(input.password, signal);
        const user = await this.store.createUser(
            { login_id: loginId, email: input.email, name: name.data, password_hash: passwordHash },
            signal
        );

        const publicGroup = await this.store.findGroupByPublicId(PUBLIC_GROUP_ID, signal);
        if (!publicGroup) {
            log.error({ group: PUBLIC_GROUP_ID }, 'Default group is missing; registration cannot complete');
            throw new AuthError('PUBLIC_GROUP_NOT_FOUND');
        }
        await this.store.addUserToGroup(user.id, publicGroup.id, null, signal);

        const { accessToken, refreshToken } = await this.issueSession(user, meta, signal);
        log.info({ userId: user.public_id }, 'User registered');

        return {
            result: {
                user: toUserInfo(user),
                tokens: bearer(accessToken),
                message: 'User registered successfully',
            },
            refreshToken,
        };
    }

    // ─── Login ───

    async login(input: LoginInput, meta: ClientMeta, signal?: AbortSignal): Promise<WithRefreshToken<LoginResponse>> {
        // The handle may be a login id or an email address
        const user =
            (await this.store.findUserByLoginId(input.login_id, signal)) ??
            (await this.store.findUserByEmail(input.login_id, signal));
        if (!user) throw new AuthError('INVALID_CREDENTIALS');

        // Accounts without a password cannot sign in this way
        if (!user.password_hash) throw new AuthError('INVALID_CREDENTIALS');

        if (!(await this.vault.verifyPassword(input.password, user.password_hash, signal))) {
            log.info({ userId: user.public_id }, 'Login rejected: wrong password');
            throw new AuthError('INVALID_CREDENTIALS');
        }

        const { accessToken, refreshToken } = await this.issueSession(user, meta, signal);
        log.info({ userId: user.public_id }, 'User logged in');

        return { result: { user: toUserInfo(user), tokens: bearer(accessToken) }, refreshToken };
    }

    // ─── Refresh ───

    async refresh(secret: string, meta: ClientMeta, signal?: AbortSignal): Promise<WithRefreshToken<TokenResponse>> {
        const rotated = await this.tokens.rotate(secret, meta, signal);
        return { result: bearer(rotated.accessToken), refreshToken: rotated.refreshToken };
    }

    // ─── Logout ───

    async logout(secret: string, signal?: AbortSignal): Promise<void> {
        await this.tokens.revoke(secret, signal);
    }

    async logoutAll(userPublicId: string, signal?: AbortSignal): Promise<void> {
        const user = await this.requireUser(userPublicId, signal);
        await this.tokens.revokeAll(user.id, signal);
        log.info({ userId: userPublicId }, 'All sessions revoked');
    }

    // ─── Me ───

    async getMe(userPublicId: string, signal?: AbortSignal): Promise<MeResponse> {
        const user = await this.requireUser(userPublicId, signal);
        const roles = await this.store.getEffectiveRoles(user.id, signal);
        return { user: toUserInfo(user), roles };
    }

    // ─── Helpers ───

    private async requireUser(publicId: string, signal?: AbortSignal): Promise<IdentityUser> {
        const user = await this.store.findUserByPublicId(publicId, signal);
        if (!user) throw new AuthError('USER_NOT_FOUND');
        return user;
    }

    /** Access token with the user's current roles, plus a new lineage root */
    private async issueSession(
        user: IdentityUser,
        meta: ClientMeta,
        signal?: AbortSignal
    ): Promise<{ accessToken: string; refreshToken: string }> {
        const roles = await this.store.getEffectiveRoles(user.id, signal);
        const accessToken = this.tokens.issueAccessToken(user, roles);
        const refresh = await this.tokens.issueRefreshToken(user.id, null, meta, signal);
        return { accessToken, refreshToken: refresh.secret };
    }
}
