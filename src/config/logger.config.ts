import { Params } from 'nestjs-pino';
import pino from 'pino';

/**
 * nestjs-pino options. stdout belongs to command output, so every
 * environment logs to stderr (fd 2).
 */
export function loggerParams(env: string | undefined, level = 'info'): Params {
    if (env === 'test') {
        // Synchronous stream, no transport worker under Jest
        return { pinoHttp: [{ level }, pino.destination({ dest: 2, sync: true })] };
    }

    return {
        pinoHttp: {
            level,
            transport: env === 'production'
                ? { target: 'pino/file', options: { destination: 2 } }
                : {
                    target: 'pino-pretty',
                    options: { colorize: true, destination: 2 },
                },
        },
    };
}
