import crypto from 'crypto';
import { argon2id } from 'hash-wasm';
import pLimit from 'p-limit';

export interface Argon2Params {
    timeCost: number;
    /** KiB */
    memoryCost: number;
    parallelism: number;
    hashLength: number;
    saltLength: number;
}

export const DEFAULT_ARGON2_PARAMS: Readonly<Argon2Params> = {
    timeCost: 1,
    memoryCost: 64 * 1024,
    parallelism: 4,
    hashLength: 32,
    saltLength: 16,
};

// $argon2id$v=19$m=<KiB>,t=<passes>,p=<lanes>$<salt>$<hash>, unpadded base64
const PHC_ARGON2ID = /^\$argon2id\$v=19\$m=(\d+),t=(\d+),p=(\d+)\$([A-Za-z0-9+/]+)\$([A-Za-z0-9+/]+)$/;

interface ParsedPhc {
    params: Omit<Argon2Params, 'saltLength'>;
    salt: Buffer;
    hash: Buffer;
}

function parsePhc(encoded: string): ParsedPhc | null {
    const match = PHC_ARGON2ID.exec(encoded);
    if (!match) return null;
    const [, m, t, p, salt, hash] = match;
    const memoryCost = Number(m);
    const timeCost = Number(t);
    const parallelism = Number(p);
    const saltBytes = Buffer.from(salt ?? '', 'base64');
    const hashBytes = Buffer.from(hash ?? '', 'base64');

    if (timeCost < 1 || parallelism < 1 || memoryCost < 8 * parallelism) return null;
    if (saltBytes.length < 8 || hashBytes.length < 4) return null;

    return {
        params: { memoryCost, timeCost, parallelism, hashLength: hashBytes.length },
        salt: saltBytes,
        hash: hashBytes,
    };
}

export interface CredentialVaultOptions {
    params?: Partial<Argon2Params>;
    /** Upper bound on Argon2 computations in flight at once */
    concurrency?: number;
}

/**
 * Password hashing and the random material behind tokens.
 *
 * Argon2 runs in WebAssembly (hash-wasm) on the calling thread. The limiter
 * caps how many computations are queued against the event loop at once.
 */
export class CredentialVault {
    private readonly params: Argon2Params;
    private readonly limit: pLimit.Limit;

    constructor(options: CredentialVaultOptions = {}) {
        this.params = { ...DEFAULT_ARGON2_PARAMS, ...options.params };
        this.limit = pLimit(options.concurrency ?? 2);
    }

    // ─── Passwords ───

    async hashPassword(password: string, signal?: AbortSignal): Promise<string> {
        signal?.throwIfAborted();
        const salt = crypto.randomBytes(this.params.saltLength);
        const encoded = await this.limit(() =>
            argon2id({
                password,
                salt,
                iterations: this.params.timeCost,
                memorySize: this.params.memoryCost,
                parallelism: this.params.parallelism,
                hashLength: this.params.hashLength,
                outputType: 'encoded',
            })
        );
        signal?.throwIfAborted();
        return encoded;
    }

    /**
     * Recomputes with the parameters recorded in `encoded`, so hashes made
     * under older settings keep verifying. Digests are compared in constant time.
     */
    async verifyPassword(password: string, encoded: string, signal?: AbortSignal): Promise<boolean> {
        signal?.throwIfAborted();
        const parsed = parsePhc(encoded);
        if (!parsed) return false;

        const computed = await this.limit(() =>
            argon2id({
                password,
                salt: parsed.salt,
                iterations: parsed.params.timeCost,
                memorySize: parsed.params.memoryCost,
                parallelism: parsed.params.parallelism,
                hashLength: parsed.params.hashLength,
                outputType: 'binary',
            })
        );
        signal?.throwIfAborted();
        return crypto.timingSafeEqual(Buffer.from(computed), parsed.hash);
    }

    // ─── Random material ───

    /** 256-bit opaque refresh secret, URL-safe base64 */
    generateRefreshSecret(): string {
        return crypto.randomBytes(32).toString('base64url');
    }

    /** Access token `jti`: 128 random bits, hex */
    generateTokenId(): string {
        return crypto.randomBytes(16).toString('hex');
    }

    /** Storage-side lookup key for a refresh secret */
    digest(value: string): string {
        return crypto.createHash('sha256').update(value).digest('hex');
    }
}
