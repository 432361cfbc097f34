import type { FastifyReply, FastifyRequest } from 'fastify';
import { AUTH_ERROR_RESPONSES, type AuthError } from '../services/auth/errors';
import { logger } from './logger';

export interface ErrorBody {
    error: string;
    message: string;
    code?: string;
}

export function respondError(reply: FastifyReply, status: number, error: string, message: string): FastifyReply {
    const body: ErrorBody = { error, message };
    return reply.code(status).send(body);
}

export function respondAuthError(request: FastifyRequest, reply: FastifyReply, err: AuthError): FastifyReply {
    const { status, error, message } = AUTH_ERROR_RESPONSES[err.code];
    if (status >= 500) {
        logRequestError(request, err, message);
    }
    const body: ErrorBody = { error, message, code: err.code };
    return reply.code(status).send(body);
}

/** Logs the real cause with request context; the client only sees `userMessage`. */
export function respondInternalError(
    request: FastifyRequest,
    reply: FastifyReply,
    err: unknown,
    userMessage = 'An internal error occurred'
): FastifyReply {
    logRequestError(request, err, userMessage);
    return respondError(reply, 500, 'Internal Server Error', userMessage);
}

function logRequestError(request: FastifyRequest, err: unknown, userMessage: string): void {
    logger.error(
        {
            err,
            method: request.method,
            path: request.url,
            remoteAddr: request.socket.remoteAddress,
            userAgent: request.headers['user-agent'],
            userMessage,
        },
        'Request failed'
    );
}
