import type { IncomingHttpHeaders } from 'http';

function firstHeader(value: string | string[] | undefined): string {
    if (Array.isArray(value)) return value[0] ?? '';
    return value ?? '';
}

/** `[v6]:port` → `v6`, `v4:port` → `v4`; bare addresses pass through. */
function stripPeerPort(address: string): string {
    if (address.startsWith('[')) {
        const end = address.indexOf(']');
        return end === -1 ? address : address.slice(1, end);
    }
    return address.split(':').length === 2 ? address.slice(0, address.lastIndexOf(':')) : address;
}

function cleanIp(raw: string): string {
    return stripPeerPort(raw.trim());
}

/**
 * Client address for audit records: first `X-Forwarded-For` hop, then
 * `X-Real-IP`, then the socket peer.
 */
export function getClientIp(headers: IncomingHttpHeaders, remoteAddress: string | undefined): string {
    const forwardedFor = firstHeader(headers['x-forwarded-for']);
    if (forwardedFor) {
        return cleanIp(forwardedFor.split(',')[0] ?? '');
    }

    const realIp = firstHeader(headers['x-real-ip']);
    if (realIp) return cleanIp(realIp);

    return stripPeerPort(remoteAddress ?? '');
}
