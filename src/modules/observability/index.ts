import * as dotenv from 'dotenv';
import winston from 'winston';

// LOG_LEVEL and SERVICE_NAME may come from .env; the shared logger below is built at import
dotenv.config();

export type LogMeta = Record<string, unknown>;

const isProduction = () => process.env.NODE_ENV === 'production';

function buildLogger(): winston.Logger {
    return winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        silent: process.env.NODE_ENV === 'test',
        defaultMeta: { service: process.env.SERVICE_NAME || 'mca-name-check' },
        format: isProduction()
            ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
            : winston.format.combine(winston.format.colorize(), winston.format.timestamp(), winston.format.simple()),
        transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
    });
}

export class Logger {
    private logger: winston.Logger;

    constructor(private readonly component?: string, base?: winston.Logger) {
        this.logger = base ?? buildLogger();
    }

    /**
     * Child logger that stamps every line with the component name.
     */
    child(component: string): Logger {
        return new Logger(component, this.logger);
    }

    debug(message: string, meta?: LogMeta) {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: LogMeta) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.log('warn', message, meta);
    }

    error(message: string, error?: unknown, meta?: LogMeta) {
        const errorMeta = error instanceof Error
            ? { error_name: error.name, error_message: error.message, error_stack: error.stack }
            : error === undefined ? {} : { error_message: String(error) };
        this.log('error', message, { ...meta, ...errorMeta });
    }

    private log(level: string, message: string, meta?: LogMeta) {
        this.logger.log(level, message, this.component ? { component: this.component, ...meta } : meta);
    }
}

export const logger = new Logger();
