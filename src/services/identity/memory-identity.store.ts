import crypto from 'crypto';
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
import { FULL_ACCESS_ROLE, PUBLIC_GROUP_ID } from '../../types/auth';

interface Membership {
    assignedBy: number | null;
    assignedAt: Date;
}

export interface InMemoryIdentityStoreOptions {
    /** Create the `public` group and the `full_access` role (default true) */
    seedDefaults?: boolean;
    now?: () => Date;
}

/**
 * Map-backed store for development and tests.
 * Every read hands out a copy so callers cannot mutate stored records.
 */
export class InMemoryIdentityStore implements IdentityStore {
    readonly name = 'memory';

    private readonly users = new Map<number, IdentityUser>();
    private readonly tokens = new Map<number, RefreshTokenRecord>();
    private readonly groups = new Map<number, Group>();
    private readonly roles = new Map<number, string>();
    private readonly groupMembers = new Map<number, Map<number, Membership>>();
    private readonly userRoles = new Map<number, Set<number>>();
    private readonly groupRoles = new Map<number, Set<number>>();
    private readonly permissions: PermissionRule[] = [];
    private readonly now: () => Date;

    private nextUserId = 1;
    private nextTokenId = 1;
    private nextGroupId = 1;
    private nextRoleId = 1;
    private nextPermissionId = 1;

    constructor(options: InMemoryIdentityStoreOptions = {}) {
        this.now = options.now ?? (() => new Date());
        if (options.seedDefaults ?? true) {
            this.createGroup(PUBLIC_GROUP_ID, { 'en-US': 'Public' });
            this.createRole(FULL_ACCESS_ROLE);
        }
    }

    // ─── Users ───

    async findUserByLoginId(loginId: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        signal?.throwIfAborted();
        return this.findUser((u) => u.login_id === loginId);
    }

    async findUserByEmail(email: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        signal?.throwIfAborted();
        return this.findUser((u) => u.email === email);
    }

    async findUserById(id: number, signal?: AbortSignal): Promise<IdentityUser | null> {
        signal?.throwIfAborted();
        return this.findUser((u) => u.id === id);
    }

    async findUserByPublicId(publicId: string, signal?: AbortSignal): Promise<IdentityUser | null> {
        signal?.throwIfAborted();
        return this.findUser((u) => u.public_id === publicId);
    }

    async createUser(user: NewUser, signal?: AbortSignal): Promise<IdentityUser> {
        signal?.throwIfAborted();
        for (const existing of this.users.values()) {
            // uniqueness covers live rows only
            if (existing.is_deleted) continue;
            if (existing.login_id === user.login_id) throw new Error(`duplicate login_id: ${user.login_id}`);
            if (existing.email === user.email) throw new Error(`duplicate email: ${user.email}`);
        }
        const created: IdentityUser = {
            id: this.nextUserId++,
            public_id: crypto.randomUUID(),
            login_id: user.login_id,
            email: user.email,
            name: { ...user.name },
            password_hash: user.password_hash,
            is_deleted: false,
        };
        this.users.set(created.id, created);
        return copyUser(created);
    }

    softDeleteUser(userId: number): void {
        const user = this.users.get(userId);
        if (user) user.is_deleted = true;
    }

    private findUser(predicate: (user: IdentityUser) => boolean): IdentityUser | null {
        for (const user of this.users.values()) {
            if (!user.is_deleted && predicate(user)) return copyUser(user);
        }
        return null;
    }

    // ─── Refresh tokens ───

    async createToken(token: NewRefreshToken, signal?: AbortSignal): Promise<RefreshTokenRecord> {
        signal?.throwIfAborted();
        for (const existing of this.tokens.values()) {
            if (existing.token_hash === token.token_hash) {
                throw new Error('duplicate refresh token hash');
            }
        }
        const now = this.now();
        const record: RefreshTokenRecord = {
            id: this.nextTokenId++,
            user_id: token.user_id,
            token_hash: token.token_hash,
            expires_at: new Date(token.expires_at),
            is_revoked: false,
            replaced_by_token_id: null,
            parent_token_id: token.parent_token_id,
            client_ip: token.client_ip,
            user_agent: token.user_agent,
            created_at: now,
            updated_at: now,
        };
        this.tokens.set(record.id, record);
        return copyToken(record);
    }

    async findTokenByHash(tokenHash: string, signal?: AbortSignal): Promise<RefreshTokenRecord | null> {
        signal?.throwIfAborted();
        for (const record of this.tokens.values()) {
            if (record.token_hash === tokenHash) return copyToken(record);
        }
        return null;
    }

    async revokeToken(tokenId: number, signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        const record = this.tokens.get(tokenId);
        if (!record) return;
        record.is_revoked = true;
        record.updated_at = this.now();
    }

    async revokeAllUserTokens(userId: number, signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        const now = this.now();
        for (const record of this.tokens.values()) {
            if (record.user_id === userId && !record.is_revoked) {
                record.is_revoked = true;
                record.updated_at = now;
            }
        }
    }

    async markTokenReplaced(oldTokenId: number, newTokenId: number, signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        const record = this.tokens.get(oldTokenId);
        if (!record) return;
        record.replaced_by_token_id = newTokenId;
        record.is_revoked = true;
        record.updated_at = this.now();
    }

    /** All refresh tokens of a user, oldest first */
    listUserTokens(userId: number): RefreshTokenRecord[] {
        return [...this.tokens.values()].filter((t) => t.user_id === userId).map(copyToken);
    }

    // ─── Groups ───

    createGroup(publicId: string, name: LocalizedText, description: LocalizedText = {}): Group {
        const group: Group = { id: this.nextGroupId++, public_id: publicId, name, description };
        this.groups.set(group.id, group);
        return { ...group };
    }

    async findGroupByPublicId(publicId: string, signal?: AbortSignal): Promise<Group | null> {
        signal?.throwIfAborted();
        for (const group of this.groups.values()) {
            if (group.public_id === publicId) return { ...group };
        }
        return null;
    }

    async addUserToGroup(userId: number, groupId: number, assignedBy: number | null, signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        const members = this.groupMembers.get(groupId) ?? new Map<number, Membership>();
        if (!members.has(userId)) {
            members.set(userId, { assignedBy, assignedAt: this.now() });
        }
        this.groupMembers.set(groupId, members);
    }

    // ─── Roles ───

    createRole(name: string): number {
        for (const [id, existing] of this.roles) {
            if (existing === name) return id;
        }
        const id = this.nextRoleId++;
        this.roles.set(id, name);
        return id;
    }

    assignRoleToUser(userId: number, roleName: string): void {
        addTo(this.userRoles, userId, this.createRole(roleName));
    }

    assignRoleToGroup(groupPublicId: string, roleName: string): void {
        const group = [...this.groups.values()].find((g) => g.public_id === groupPublicId);
        if (!group) throw new Error(`unknown group: ${groupPublicId}`);
        addTo(this.groupRoles, group.id, this.createRole(roleName));
    }

    async getEffectiveRoles(userId: number, signal?: AbortSignal): Promise<string[]> {
        signal?.throwIfAborted();
        const roleIds = new Set(this.userRoles.get(userId));
        for (const [groupId, members] of this.groupMembers) {
            if (!members.has(userId)) continue;
            for (const roleId of this.groupRoles.get(groupId) ?? []) roleIds.add(roleId);
        }
        const names = new Set<string>();
        for (const roleId of roleIds) {
            const name = this.roles.get(roleId);
            if (name !== undefined) names.add(name);
        }
        return [...names].sort();
    }

    // ─── Permissions ───

    addPermissionRule(method: string, pathPattern: string, requiredRoles: string[]): PermissionRule {
        const rule: PermissionRule = {
            id: this.nextPermissionId++,
            method,
            path_pattern: pathPattern,
            required_roles: [...requiredRoles],
        };
        this.permissions.push(rule);
        return { ...rule, required_roles: [...rule.required_roles] };
    }

    async listPermissionRules(signal?: AbortSignal): Promise<PermissionRule[]> {
        signal?.throwIfAborted();
        return this.permissions.map((rule) => ({ ...rule, required_roles: [...rule.required_roles] }));
    }
}

function copyUser(user: IdentityUser): IdentityUser {
    return { ...user, name: { ...user.name } };
}

function copyToken(record: RefreshTokenRecord): RefreshTokenRecord {
    return {
        ...record,
        expires_at: new Date(record.expires_at),
        created_at: new Date(record.created_at),
        updated_at: new Date(record.updated_at),
    };
}

function addTo(index: Map<number, Set<number>>, key: number, value: number): void {
    const set = index.get(key) ?? new Set<number>();
    set.add(value);
    index.set(key, set);
}
