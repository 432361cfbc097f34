import { AuthService } from '../services/auth/auth.service';
import { CredentialVault } from '../services/auth/credential-vault';
import { TokenAuthority } from '../services/auth/token-authority';
import { InMemoryIdentityStore } from '../services/identity';
import { PermissionTable } from '../services/rbac/permission-table';

export const TEST_SECRET = 'test-secret';

// Smallest settings Argon2id accepts for p=1; keeps suites fast
export const FAST_ARGON2 = { memoryCost: 1024, parallelism: 1 };

export const TEST_META = { clientIp: '203.0.113.7', userAgent: 'vitest' };

/** Settable clock shared by the store and the token authority */
export class TestClock {
    private current: number;

    constructor(start = '2026-03-01T09:00:00.000Z') {
        this.current = Date.parse(start);
    }

    now = (): Date => new Date(this.current);

    advance(seconds: number): void {
        this.current += seconds * 1000;
    }
}

export function createHarness() {
    const clock = new TestClock();
    const store = new InMemoryIdentityStore({ now: clock.now });
    const vault = new CredentialVault({ params: FAST_ARGON2 });
    const tokens = new TokenAuthority(store, vault, { secret: TEST_SECRET, now: clock.now });
    const authService = new AuthService(store, vault, tokens);
    const permissionTable = new PermissionTable(store);
    return { clock, store, vault, tokens, authService, permissionTable };
}

export type Harness = ReturnType<typeof createHarness>;
