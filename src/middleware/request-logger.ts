import type { FastifyError, FastifyInstance } from 'fastify';
import { STATUS_CODES } from 'http';
import { respondError, respondInternalError } from '../utils/http';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ module: 'http' });

/**
 * One log line per response; failed requests also record who made them.
 * Called on the root instance so the hooks cover every route.
 */
export function registerRequestLogging(app: FastifyInstance): void {
    app.addHook('onResponse', async (request, reply) => {
        const entry = {
            method: request.method,
            url: request.url,
            status: reply.statusCode,
            durationMs: Math.round(reply.elapsedTime),
        };

        if (reply.statusCode >= 500) {
            log.error({ ...entry, remoteAddr: request.socket.remoteAddress, userAgent: request.headers['user-agent'] }, 'Request completed');
        } else if (reply.statusCode >= 400) {
            log.warn({ ...entry, remoteAddr: request.socket.remoteAddress, userAgent: request.headers['user-agent'] }, 'Request completed');
        } else {
            log.info(entry, 'Request completed');
        }
    });

    // Anything a handler throws ends here instead of taking the process down
    app.setErrorHandler((err: FastifyError, request, reply) => {
        const status = err.statusCode ?? 500;
        if (status >= 400 && status < 500) {
            respondError(reply, status, STATUS_CODES[status] ?? 'Bad Request', 'Invalid request body');
            return;
        }
        respondInternalError(request, reply, err, 'An unexpected error occurred');
    });
}

/**
 * Gives each request an AbortSignal that fires if the client goes away
 * before the response has been written.
 */
export function registerRequestSignal(app: FastifyInstance): void {
    app.addHook('onRequest', async (request, reply) => {
        const controller = new AbortController();
        reply.raw.once('close', () => {
            if (!reply.raw.writableFinished) controller.abort(new Error('client closed the connection'));
        });
        request.abortSignal = controller.signal;
    });
}
