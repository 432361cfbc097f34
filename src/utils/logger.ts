import pino from 'pino';
import { config } from '../config';

function defaultLevel(): pino.LevelWithSilent {
    if (config.nodeEnv === 'production') return 'info';
    return config.nodeEnv === 'test' ? 'silent' : 'debug';
}

function createLogger() {
    const opts: pino.LoggerOptions = {
        level: config.logLevel ?? defaultLevel(),
        serializers: { err: pino.stdSerializers.err },
        base: { service: 'knowledgecenter-api' },
    };

    // Only use pino-pretty in development (not test/production)
    if (config.nodeEnv === 'development') {
        try {
            require.resolve('pino-pretty');
            opts.transport = { target: 'pino-pretty', options: { colorize: true } };
        } catch {
            // pino-pretty is a dev dependency; plain JSON lines otherwise
        }
    }

    return pino(opts);
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>) {
    return logger.child(context);
}
