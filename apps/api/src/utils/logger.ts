import winston from 'winston';

const SERVICE_NAME = 'mock-interviewer-api';

type LogMeta = Record<string, unknown>;

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.json(),
    transports: [new winston.transports.Console()],
    silent: process.env.NODE_ENV === 'test',
});

export function logRequest(method: string, endpoint: string, meta: LogMeta = {}) {
    logger.info(`: ${method} ${endpoint}`, { service: SERVICE_NAME, method, endpoint, ...meta });
}

export function logCache(action: 'hit' | 'miss' | 'write', meta: LogMeta = {}) {
    logger.info(`: Cache ${action}`, { service: SERVICE_NAME, action, ...meta });
}

export function logAICall(model: string, status: 'start' | 'success' | 'error', meta: LogMeta = {}) {
    const level = status === 'error' ? 'error' : 'info';
    logger.log(level, `: AI API call: ${status}`, { service: SERVICE_NAME, model, status, ...meta });
}

export default logger;
