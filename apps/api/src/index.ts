import Redis from 'ioredis';
import { createApp } from './app';
import { AppConfig, loadConfig, loadDotenv } from './config/env';
import { createRateLimiter } from './middleware/rateLimiter';
import { OpenAICompletionClient, pingCompletionService } from './services/completionClient';
import { RedisCacheStore } from './services/questionCache';
import { errorMessage } from './utils/errors';
import logger from './utils/logger';

function createRedisClient(config: AppConfig): Redis {
	const redis = new Redis({
		host: config.redis.host,
		port: config.redis.port,
		password: config.redis.password,
		retryStrategy: (times) => Math.min(times * 50, 2000),
		maxRetriesPerRequest: 3,
	});

	redis.on('connect', () => {
		logger.info('Redis connected', { host: config.redis.host, port: config.redis.port });
	});

	redis.on('error', (err) => {
		logger.error('Redis connection error', { error: err.message });
	});

	return redis;
}

async function main(): Promise<void> {
	loadDotenv();
	const config = loadConfig();
	logger.level = config.logLevel;

	const redis = createRedisClient(config);
	const completionClient = new OpenAICompletionClient(config.openai);

	if (config.skipStartupProbe) {
		logger.warn('[STARTUP] Skipping completion API check');
	} else {
		logger.info('[STARTUP] Testing completion API connection', { model: completionClient.model });
		await pingCompletionService(completionClient);
		logger.info('[STARTUP] Completion API connection successful');
	}

	const app = createApp({
		completionClient,
		cache: new RedisCacheStore(redis),
		rateLimiters: {
			generateQuestions: createRateLimiter('rl:generate-questions', redis),
			analyzeResponses: createRateLimiter('rl:analyze-responses', redis),
		},
		allowedOrigins: config.allowedOrigins,
		trustProxy: config.trustProxy,
	});

	const server = app.listen(config.port, () => {
		logger.info('API server running', {
			port: config.port,
			environment: process.env.NODE_ENV || 'development',
			allowedOrigins: config.allowedOrigins,
		});
	});

	const shutdown = (signal: string) => {
		logger.info(`${signal} signal received: closing HTTP server`);
		server.close(() => {
			void redis.quit()
				.catch((error: unknown) => {
					logger.warn('Redis quit failed', { error: errorMessage(error) });
				})
				.finally(() => {
					logger.info('Redis connection closed, exiting process');
					process.exit(0);
				});
		});
	};

	process.on('SIGTERM', () => shutdown('SIGTERM'));
	process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
	logger.error('[STARTUP] Failed to start API server', {
		error: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
