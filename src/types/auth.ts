// ─── Identity & RBAC Types ───

/** Locale-keyed text, e.g. `{ "en-US": "Alice", "ko-KR": "앨리스" }` */
export type LocalizedText = Record<string, string>;

export interface IdentityUser {
    id: number;
    public_id: string;
    login_id: string;
    email: string;
    name: LocalizedText;
    /** PHC string; empty for accounts that cannot sign in with a password */
    password_hash: string;
    is_deleted: boolean;
}

export interface NewUser {
    login_id: string;
    email: string;
    name: LocalizedText;
    password_hash: string;
}

/** What the API returns about a user; never includes the password hash */
export interface UserInfo {
    id: string;
    login_id: string;
    name: LocalizedText;
    email: string;
}

export interface RefreshTokenRecord {
    id: number;
    user_id: number;
    /** SHA-256 of the opaque secret; the secret itself is never stored */
    token_hash: string;
    expires_at: Date;
    is_revoked: boolean;
    replaced_by_token_id: number | null;
    parent_token_id: number | null;
    client_ip: string | null;
    user_agent: string | null;
    created_at: Date;
    updated_at: Date;
}

export interface NewRefreshToken {
    user_id: number;
    token_hash: string;
    expires_at: Date;
    parent_token_id: number | null;
    client_ip: string | null;
    user_agent: string | null;
}

export interface Group {
    id: number;
    public_id: string;
    name: LocalizedText;
    description: LocalizedText;
}

export interface PermissionRule {
    id: number;
    /** HTTP verb, or `*` for every verb */
    method: string;
    /** Registered route template with `{param}` placeholders */
    path_pattern: string;
    required_roles: string[];
}

/** Decoded access token claims */
export interface AccessTokenClaims {
    user_id: string;
    login_id: string;
    email: string;
    roles: string[];
    jti: string;
    iat: number;
    exp: number;
    iss: string;
}

/** What gets attached to the Fastify request after authentication */
export interface AuthUser {
    id: string;
    roles: string[];
    claims: AccessTokenClaims;
}

/** Transport facts recorded on refresh tokens for audit */
export interface ClientMeta {
    clientIp: string;
    userAgent: string;
}

export interface TokenResponse {
    access_token: string;
    token_type: 'Bearer';
    expires_in: number;
}

export interface RegisterResponse {
    user: UserInfo;
    tokens: TokenResponse;
    message: string;
}

export interface LoginResponse {
    user: UserInfo;
    tokens: TokenResponse;
}

export interface MeResponse {
    user: UserInfo;
    roles: string[];
}

/** A service result plus the refresh secret the route puts in the cookie */
export interface WithRefreshToken<T> {
    result: T;
    refreshToken: string;
}

export const FULL_ACCESS_ROLE = 'full_access';
export const PUBLIC_GROUP_ID = 'public';
