export type { IdentityStore } from './identity-store.interface';
export { PgIdentityStore } from './pg-identity.store';
export { InMemoryIdentityStore } from './memory-identity.store';

import type { IdentityStore } from './identity-store.interface';
import { PgIdentityStore } from './pg-identity.store';
import { InMemoryIdentityStore } from './memory-identity.store';
import type { AppConfig } from '../../config';

export function createIdentityStore(config: Pick<AppConfig, 'identityStore'>): IdentityStore {
    switch (config.identityStore) {
        case 'postgres':
            return new PgIdentityStore();
        case 'memory':
            return new InMemoryIdentityStore();
        default:
            throw new Error(`Unknown identity store: ${String(config.identityStore)}. Implement adapter and register here.`);
    }
}
