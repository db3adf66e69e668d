import * as winston from 'winston';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    defaultMeta: { service: process.env.SERVICE_NAME || 'unknown-service' },
    transports: [
        new winston.transports.Console()
    ]
});
