import type { PermissionRule } from '../../types/auth';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ module: 'rbac' });

export const ANY_METHOD = '*';

/** method → path pattern → roles, any one of which grants access */
export type PermissionSnapshot = ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;

export interface PermissionSource {
    listPermissionRules(signal?: AbortSignal): Promise<PermissionRule[]>;
}

export function buildSnapshot(rules: readonly PermissionRule[]): PermissionSnapshot {
    const byMethod = new Map<string, Map<string, readonly string[]>>();
    for (const rule of rules) {
        const method = rule.method.toUpperCase();
        const patterns = byMethod.get(method) ?? new Map<string, readonly string[]>();
        patterns.set(rule.path_pattern, Object.freeze([...rule.required_roles]));
        byMethod.set(method, patterns);
    }
    return byMethod;
}

/**
 * In-memory permission rules, reloadable while requests are being served.
 *
 * A reload builds a complete snapshot aside and then swaps the reference, so
 * a reader sees either the whole old table or the whole new one. Reloads are
 * queued behind each other; the last one requested wins.
 */
export class PermissionTable {
    private snapshot: PermissionSnapshot = new Map();
    private writer: Promise<unknown> = Promise.resolve();

    constructor(private readonly source: PermissionSource) {}

    /** Fetches every rule from the source and replaces the table. Resolves to the rule count. */
    load(signal?: AbortSignal): Promise<number> {
        const run = this.writer.then(async () => {
            const rules = await this.source.listPermissionRules(signal);
            this.replace(rules);
            return rules.length;
        });
        // keep the queue moving after a failed reload; `run` still rejects for its caller
        this.writer = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    replace(rules: readonly PermissionRule[]): void {
        const next = buildSnapshot(rules);
        this.snapshot = next;
        log.info({ rules: rules.length }, 'Permission table loaded');
    }

    /**
     * Roles required for `(method, pattern)`; the exact method wins over `*`.
     * `undefined` when no rule covers the route.
     */
    getRequiredRoles(method: string, pathPattern: string): readonly string[] | undefined {
        const table = this.snapshot;
        return table.get(method.toUpperCase())?.get(pathPattern) ?? table.get(ANY_METHOD)?.get(pathPattern);
    }

    get size(): number {
        let count = 0;
        for (const patterns of this.snapshot.values()) count += patterns.size;
        return count;
    }
}
