import type {
    Group,
    IdentityUser,
    NewRefreshToken,
    NewUser,
    PermissionRule,
    RefreshTokenRecord,
} from '../../types/auth';

/**
 * Persistence boundary for users, refresh tokens, groups and roles.
 * Implement this for PostgreSQL, an in-memory map, etc.
 *
 * Lookups resolve to `null` when nothing matches; every other failure rejects.
 * Soft-deleted users are never returned.
 */
export interface IdentityStore {
    readonly name: string;

    // Users
    findUserByLoginId(loginId: string, signal?: AbortSignal): Promise<IdentityUser | null>;
    findUserByEmail(email: string, signal?: AbortSignal): Promise<IdentityUser | null>;
    findUserById(id: number, signal?: AbortSignal): Promise<IdentityUser | null>;
    findUserByPublicId(publicId: string, signal?: AbortSignal): Promise<IdentityUser | null>;

    /** Assigns internal and public ids; the user starts visible and not deleted. */
    createUser(user: NewUser, signal?: AbortSignal): Promise<IdentityUser>;

    // Refresh tokens
    createToken(token: NewRefreshToken, signal?: AbortSignal): Promise<RefreshTokenRecord>;
    findTokenByHash(tokenHash: string, signal?: AbortSignal): Promise<RefreshTokenRecord | null>;
    revokeToken(tokenId: number, signal?: AbortSignal): Promise<void>;
    revokeAllUserTokens(userId: number, signal?: AbortSignal): Promise<void>;

    /** Sets `replaced_by_token_id` and `is_revoked` in one write. */
    markTokenReplaced(oldTokenId: number, newTokenId: number, signal?: AbortSignal): Promise<void>;

    // Groups
    findGroupByPublicId(publicId: string, signal?: AbortSignal): Promise<Group | null>;

    /** Idempotent: an existing membership is left as it is. */
    addUserToGroup(userId: number, groupId: number, assignedBy: number | null, signal?: AbortSignal): Promise<void>;

    // Roles
    /** Direct and group-inherited roles, deduplicated and sorted. */
    getEffectiveRoles(userId: number, signal?: AbortSignal): Promise<string[]>;

    // Permissions
    listPermissionRules(signal?: AbortSignal): Promise<PermissionRule[]>;
}
