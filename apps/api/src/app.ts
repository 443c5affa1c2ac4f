import cors, { CorsOptions } from 'cors';
import crypto from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import { RateLimiterAbstract } from 'rate-limiter-flexible';
import { inputValidatorMiddleware } from './middleware/inputValidator';
import { rateLimitMiddleware } from './middleware/rateLimiter';
import { CompletionClient } from './services/completionClient';
import { analyzeResponses } from './services/feedbackService';
import { CacheStore } from './services/questionCache';
import { generateQuestions } from './services/questionService';
import {
	AnalyzeResponsesRequest,
	AnalyzeResponsesResponse,
	ErrorResponse,
	GenerateQuestionsRequest,
	GenerateQuestionsResponse,
} from './types/interview';
import { errorDetails, errorMessage } from './utils/errors';
import logger, { logRequest } from './utils/logger';
import {
	analyzeResponsesRequestSchema,
	generateQuestionsRequestSchema,
} from './utils/validators';

export interface AppDependencies {
	completionClient: CompletionClient;
	cache: CacheStore;
	rateLimiters: {
		generateQuestions: RateLimiterAbstract;
		analyzeResponses: RateLimiterAbstract;
	};
	allowedOrigins: string[];
	trustProxy?: boolean;
}

// Request tracking interface
interface RequestContext {
	requestId: string;
	startTime: number;
	ip?: string;
}

const PREFLIGHT_MAX_AGE_SECONDS = 3600;

// Generate a simple request ID
function generateRequestId(): string {
	return crypto.randomBytes(8).toString('hex');
}

function isClientError(error: unknown): error is { status: number; type?: string } {
	if (typeof error !== 'object' || error === null || !('status' in error)) {
		return false;
	}
	const { status } = error;
	return typeof status === 'number' && status >= 400 && status < 500;
}

export function createApp(deps: AppDependencies) {
	const app = express();
	const requestContextMap = new WeakMap<Request, RequestContext>();

	app.set('trust proxy', deps.trustProxy ?? false);

	function sendInternalError(req: Request, res: Response, endpoint: string, error: unknown) {
		const requestId = requestContextMap.get(req)?.requestId || 'unknown';
		logger.error(`Error in ${endpoint}`, {
			requestId,
			endpoint,
			name: error instanceof Error ? error.name : undefined,
			error: errorMessage(error),
			...errorDetails(error),
			stack: error instanceof Error ? error.stack : undefined,
		});
		const errorResponse: ErrorResponse = { detail: errorMessage(error) };
		res.status(500).json(errorResponse);
	}

	const corsOptions: CorsOptions = {
		origin: deps.allowedOrigins,
		credentials: true,
		methods: ['GET', 'POST', 'OPTIONS'],
		exposedHeaders: ['*'],
		maxAge: PREFLIGHT_MAX_AGE_SECONDS,
		optionsSuccessStatus: 200,
	};
	const corsMiddleware = cors(corsOptions);

	// Preflights go through the allow-list; any other OPTIONS falls through to the catch-all route
	app.use((req: Request, res: Response, next: NextFunction) => {
		if (req.method === 'OPTIONS' && !req.header('Access-Control-Request-Method')) {
			return next();
		}
		return corsMiddleware(req, res, next);
	});
	app.use(express.json({ limit: '10mb' }));

	// Request tracking middleware
	app.use((req: Request, res: Response, next: NextFunction) => {
		const requestId = generateRequestId();
		requestContextMap.set(req, {
			requestId,
			startTime: Date.now(),
			ip: req.ip,
		});
		res.setHeader('X-Request-ID', requestId);
		next();
	});

	app.options('*', (req: Request, res: Response) => {
		res.set({
			'Access-Control-Allow-Origin': '*',
			'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
			'Access-Control-Allow-Headers': '*',
			'Access-Control-Max-Age': String(PREFLIGHT_MAX_AGE_SECONDS),
		});
		res.status(200).json('OK');
	});

	app.get('/', (req: Request, res: Response) => {
		logRequest('GET', '/', { requestId: requestContextMap.get(req)?.requestId });
		res.json({ message: 'Mock Interviewer API is running' });
	});

	app.post(
		'/generate-questions',
		rateLimitMiddleware(deps.rateLimiters.generateQuestions),
		inputValidatorMiddleware(generateQuestionsRequestSchema),
		async (req: Request, res: Response) => {
			const context = requestContextMap.get(req);
			const requestId = context?.requestId || 'unknown';
			const { job_desc: jobDesc }: GenerateQuestionsRequest = req.body;

			logRequest('POST', '/generate-questions', { requestId, title: jobDesc.title });

			try {
				const questions = await generateQuestions(jobDesc, deps, requestId);
				logger.info('Questions response sent', {
					requestId,
					count: questions.length,
					processingTime: Date.now() - (context?.startTime ?? Date.now()),
				});
				const response: GenerateQuestionsResponse = { questions };
				res.json(response);
			} catch (error) {
				sendInternalError(req, res, '/generate-questions', error);
			}
		}
	);

	app.post(
		'/analyze-responses',
		rateLimitMiddleware(deps.rateLimiters.analyzeResponses),
		inputValidatorMiddleware(analyzeResponsesRequestSchema),
		async (req: Request, res: Response) => {
			const context = requestContextMap.get(req);
			const requestId = context?.requestId || 'unknown';
			const { answers }: AnalyzeResponsesRequest = req.body;

			logRequest('POST', '/analyze-responses', { requestId, answers: answers.length });

			try {
				const report = await analyzeResponses(answers, deps, requestId);
				logger.info('Feedback response sent', {
					requestId,
					overallScore: report.overall_score,
					processingTime: Date.now() - (context?.startTime ?? Date.now()),
				});
				const response: AnalyzeResponsesResponse = { feedback: JSON.stringify(report) };
				res.json(response);
			} catch (error) {
				sendInternalError(req, res, '/analyze-responses', error);
			}
		}
	);

	// Body parser failures arrive here with a 4xx status; everything else is a 500
	app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
		if (res.headersSent) {
			return next(error);
		}
		if (isClientError(error)) {
			const detail = error.type === 'entity.parse.failed' ? 'body: Invalid JSON' : `body: ${errorMessage(error)}`;
			const errorResponse: ErrorResponse = { detail: [detail] };
			return res.status(error.status === 400 ? 422 : error.status).json(errorResponse);
		}
		return sendInternalError(req, res, req.path, error);
	});

	return app;
}
