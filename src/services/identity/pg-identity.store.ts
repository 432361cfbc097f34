import { query, queryOne } from '../../db';
import type { IdentityStore } from './identity-store.interface';
import type {
    Group,
    IdentityUser,
    LocalizedText,
    NewRefreshToken,
    NewUser,
    PermissionRule,
    RefreshTokenRecord,
} from '../../types/auth';

// pg hands BIGINT/BIGSERIAL columns back as strings
type BigIntColumn = string | number;

interface UserRow {
    id: number;
    public_id: string;
    login_id: string;
    email: string;
    name: LocalizedText | null;
    password_hash: string | null;
    is_deleted: boolean;
}

interface TokenRow {
    id: BigIntColumn;
    user_id: number;
    token_hash: string;
    expires_at: Date;
    is_revoked: boolean;
    replaced_by_token_id: BigIntColumn | null;
    parent_token_id: BigIntColumn | null;
    client_ip: string | null;
    user_agent: string | null;
    created_at: Date;
    updated_at: Date;
}

interface GroupRow {
    id: number;
    public_id: string;
    name: LocalizedText | null;
    description: LocalizedText | null;
}

interface PermissionRow {
    id: BigIntColumn;
    method: string;
    path_pattern: string;
    required_roles: string[] | null;
}

const USER_COLUMNS = 'id, public_id, login_id, email, name, password_hash, is_deleted';
const TOKEN_COLUMNS = `id, user_id, token_hash, expires_at, is_revoked, replaced_by_token_id,
    parent_token_id, client_ip, user_agent, created_at, updated_at`;

function toUser(row: UserRow): IdentityUser {
    return {
        id: row.id,
        public_id: row.public_id,
        login_id: row.login_id,
        email: row.email,
        name: row.name ?? {},
        password_hash: row.password_hash ?? '',
        is_deleted: row.is_deleted,
    };
}

function toNullableId(value: BigIntColumn | null): number | null {
    return value === null ? null : Number(value);
}

function toToken(row: TokenRow): RefreshTokenRecord {
    return {
        id: Number(row.id),
        user_id: row.user_id,
        token_hash: row.token_hash,
        expires_at: row.expires_at,
        is_revoked: row.is_revoked,
        replaced_by_token_id: toNullableId(row.replaced_by_token_id),
        parent_token_id: toNullableId(row.parent_token_id),
        client_ip: row.client_ip,
        user_agent: row.user_agent,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

/**
 * PostgreSQL identity store over the tables created by
 * `db/migrations/001_identity.sql`.
 */
export class PgIdentityStore implements IdentityStore {
    readonly name = 'postgres';

    // ─── Users ───

    async findUserByLoginId(loginId: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        const row = await queryOne<UserRow>(
            `SELECT ${USER_COLUMNS} FROM users WHERE login_id = $1 AND is_deleted = false`,
            [loginId],
            signal
        );
        return row ? toUser(row) : null;
    }

    async findUserByEmail(email: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        const row = await queryOne<UserRow>(
            `SELECT ${USER_COLUMNS} FROM users WHERE email = $1 AND is_deleted = false`,
            [email],
            signal
        );
        return row ? toUser(row) : null;
    }

    async findUserById(id: number, signal?: AbortSignal): Promise<IdentityUser | null> {
        const row = await queryOne<UserRow>(
            `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 AND is_deleted = false`,
            [id],
            signal
        );
        return row ? toUser(row) : null;
    }

    async findUserByPublicId(publicId: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        const row = await queryOne<UserRow>(
            `SELECT ${USER_COLUMNS} FROM users WHERE public_id = $1 AND is_deleted = false`,
            [publicId],
            signal
        );
        return row ? toUser(row) : null;
    }

    async createUser(user: NewUser, signal?: AbortSignal): Promise<IdentityUser> {
        const row = await queryOne<UserRow>(
            `INSERT INTO users (login_id, email, name, password_hash, is_visible, is_deleted)
             VALUES ($1, $2, $3, $4, true, false)
             RETURNING ${USER_COLUMNS}`,
            [user.login_id, user.email, JSON.stringify(user.name), user.password_hash],
            signal
        );
        if (!row) throw new Error('INSERT INTO users returned no row');
        return toUser(row);
    }

    // ─── Refresh tokens ───

    async createToken(token: NewRefreshToken, signal?: AbortSignal): Promise<RefreshTokenRecord> {
        const row = await queryOne<TokenRow>(
            `INSERT INTO user_tokens (user_id, token_hash, expires_at, is_revoked, parent_token_id, client_ip, user_agent)
             VALUES ($1, $2, $3, false, $4, $5, $6)
             RETURNING ${TOKEN_COLUMNS}`,
            [token.user_id, token.token_hash, token.expires_at, token.parent_token_id, token.client_ip, token.user_agent],
            signal
        );
        if (!row) throw new Error('INSERT INTO user_tokens returned no row');
        return toToken(row);
    }

    async findTokenByHash(tokenHash: string, signal?: AbortSignal): Promise<RefreshTokenRecord | null> {
        const row = await queryOne<TokenRow>(
            `SELECT ${TOKEN_COLUMNS} FROM user_tokens WHERE token_hash = $1`,
            [tokenHash],
            signal
        );
        return row ? toToken(row) : null;
    }

    async revokeToken(tokenId: number, signal?: AbortSignal): Promise<void> {
        await query('UPDATE user_tokens SET is_revoked = true, updated_at = NOW() WHERE id = $1', [tokenId], signal);
    }

    async revokeAllUserTokens(userId: number, signal?: AbortSignal): Promise<void> {
        await query(
            'UPDATE user_tokens SET is_revoked = true, updated_at = NOW() WHERE user_id = $1 AND is_revoked = false',
            [userId],
            signal
        );
    }

    async markTokenReplaced(oldTokenId: number, newTokenId: number, signal?: AbortSignal): Promise<void> {
        await query(
            'UPDATE user_tokens SET replaced_by_token_id = $1, is_revoked = true, updated_at = NOW() WHERE id = $2',
            [newTokenId, oldTokenId],
            signal
        );
    }

    // ─── Groups ───

    async findGroupByPublicId(publicId: string, signal?: AbortSignal): Promise<Group | null> {
        const row = await queryOne<GroupRow>(
            'SELECT id, public_id, name, description FROM groups WHERE public_id = $1',
            [publicId],
            signal
        );
        if (!row) return null;
        return {
            id: row.id,
            public_id: row.public_id,
            name: row.name ?? {},
            description: row.description ?? {},
        };
    }

    async addUserToGroup(userId: number, groupId: number, assignedBy: number | null, signal?: AbortSignal): Promise<void> {
        await query(
            `INSERT INTO group_users (group_id, user_id, assigned_by, assigned_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (group_id, user_id) DO NOTHING`,
            [groupId, userId, assignedBy],
            signal
        );
    }

    // ─── Roles ───

    async getEffectiveRoles(userId: number, signal?: AbortSignal): Promise<string[]> {
        const rows = await query<{ name: string }>(
            `SELECT DISTINCT r.name
             FROM roles r
             WHERE r.id IN (
                 SELECT role_id FROM user_roles WHERE user_id = $1
                 UNION
                 SELECT gr.role_id
                 FROM group_roles gr
                 INNER JOIN group_users gu ON gr.group_id = gu.group_id
                 WHERE gu.user_id = $1
             )
             ORDER BY r.name`,
            [userId],
            signal
        );
        return rows.map((r) => r.name);
    }

    // ─── Permissions ───

    async listPermissionRules(signal?: AbortSignal): Promise<PermissionRule[]> {
        const rows = await query<PermissionRow>(
            'SELECT id, method, path_pattern, required_roles FROM api_permissions ORDER BY id',
            [],
            signal
        );
        return rows.map((row) => ({
            id: Number(row.id),
            method: row.method,
            path_pattern: row.path_pattern,
            required_roles: row.required_roles ?? [],
        }));
    }
}
