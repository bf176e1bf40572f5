/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the Policy QA backend.
 * It exposes REST endpoints for:
 * - Claim evaluation against the fixed policy corpus
 * - PDF upload into a per-session corpus
 * - Free-text questions against a session's corpus
 * - Health checks
 *
 * Routes only validate input and delegate to services. Every failure ends
 * in the error middleware, which logs it and answers with a status and a
 * message that carries no internal detail.
 */

import { Server } from 'http';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import {
    ErrorResponse,
    EvaluationResult,
    HealthResponse,
    QueryResponse,
    UploadResponse,
} from '../../shared/types';
import { DEFAULT_APP_CONFIG } from '../config';
import { AppError, SessionNotFoundError } from '../errors';
import { createGeminiClient, IGeminiClient } from '../clients/geminiClient';
import {
    CorpusSource,
    IDocumentIngestor,
    IRAGEngine,
    ISessionStore,
    createDocumentIngestor,
    createRAGEngine,
    createSessionStore,
    staticCorpus,
    validateEvaluateRequest,
    validateQueryRequest,
} from '../services';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin: string;
    /** Directory for temporary upload files */
    uploadDir: string;
    /** Per-file upload size limit in bytes */
    maxUploadBytes: number;
    /** Gemini client instance (for dependency injection) */
    geminiClient?: IGeminiClient;
    /** RAG engine instance (for dependency injection) */
    ragEngine?: IRAGEngine;
    /** Session store instance (for dependency injection) */
    sessionStore?: ISessionStore;
    /** Document ingestor instance (for dependency injection) */
    documentIngestor?: IDocumentIngestor;
    /** Fixed policy corpus behind /evaluate */
    corpus?: CorpusSource;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: DEFAULT_APP_CONFIG.port,
    corsOrigin: DEFAULT_APP_CONFIG.corsOrigin,
    uploadDir: DEFAULT_APP_CONFIG.uploadDir,
    maxUploadBytes: DEFAULT_APP_CONFIG.maxUploadBytes,
};

const GENERIC_FAILURE_MESSAGE = 'Failed to process the request.';

/**
 * Maps any thrown value to a status code and a client-safe body.
 */
export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorResponse } {
    if (err instanceof multer.MulterError) {
        return { statusCode: 400, body: { error: err.message, code: err.code } };
    }

    if (err instanceof AppError) {
        if (err.statusCode < 500) {
            return { statusCode: err.statusCode, body: { error: err.message, code: err.code } };
        }
        return { statusCode: err.statusCode, body: { error: GENERIC_FAILURE_MESSAGE } };
    }

    // Malformed JSON bodies are rejected by express.json()
    if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
        return { statusCode: 400, body: { error: 'Request body is not valid JSON.', code: 'INVALID_JSON' } };
    }

    if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large') {
        return { statusCode: 413, body: { error: 'Request body is too large.', code: 'PAYLOAD_TOO_LARGE' } };
    }

    return { statusCode: 500, body: { error: GENERIC_FAILURE_MESSAGE } };
}

/**
 * Creates and configures the Express application.
 *
 * Creating the app without listening keeps it testable: tests inject fakes
 * for every collaborator and bind to an ephemeral port.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const geminiClient = mergedConfig.geminiClient || createGeminiClient();
    const ragEngine = mergedConfig.ragEngine || createRAGEngine(geminiClient, geminiClient);
    const sessionStore = mergedConfig.sessionStore || createSessionStore();
    const documentIngestor = mergedConfig.documentIngestor || createDocumentIngestor();
    const corpus = mergedConfig.corpus || staticCorpus(null);

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Uploaded files go to a temporary directory; the ingestor removes them
    const upload = multer({
        dest: mergedConfig.uploadDir,
        limits: {
            fileSize: mergedConfig.maxUploadBytes,
        },
    });

    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /health
     *
     * Reports whether the fixed corpus is loaded and a model key is configured.
     * Always 200: the process is up even when a capability is degraded.
     */
    app.get('/health', (_req: Request, res: Response) => {
        const corpusLoaded = corpus.getIndex() !== null;
        const apiKeyConfigured = geminiClient.isConfigured();

        const response: HealthResponse = {
            status: corpusLoaded && apiKeyConfigured ? 'ok' : 'degraded',
            corpusLoaded,
            apiKeyConfigured,
            sessions: sessionStore.size(),
        };
        res.json(response);
    });

    // =========================================================================
    // Fixed Corpus: Claim Evaluation
    // =========================================================================

    /**
     * POST /evaluate
     *
     * Evaluates a claim query against the policy corpus loaded at startup
     * and returns a structured verdict.
     */
    app.post('/evaluate', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const index = corpus.getIndex();
            if (!index) {
                res.status(500).json({
                    error: 'Vector store is not available.',
                    code: 'VECTOR_STORE_UNAVAILABLE',
                });
                return;
            }

            const validation = validateEvaluateRequest(req.body);
            if (!validation.valid) {
                res.status(400).json({
                    error: validation.error,
                    code: 'INVALID_QUERY',
                });
                return;
            }

            const result: EvaluationResult = await ragEngine.evaluate(index, validation.value.query);
            res.json(result);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Per-Session Corpus: Upload and Query
    // =========================================================================

    /**
     * POST /upload
     *
     * Accepts one or more PDFs in the multipart field `files`, indexes them
     * as one batch and binds the index to a new session. Any non-PDF rejects
     * the whole upload; no session is created on failure.
     */
    app.post('/upload', upload.array('files'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const files = Array.isArray(req.files) ? req.files : [];

            if (files.length === 0) {
                res.status(400).json({
                    error: 'No files uploaded. Please select at least one PDF.',
                    code: 'MISSING_FILES',
                });
                return;
            }

            const pages = await documentIngestor.ingestUploads(
                files.map((file) => ({ originalName: file.originalname, path: file.path }))
            );
            const index = await ragEngine.buildIndex(pages);
            const sessionId = await sessionStore.create(index);

            console.log(`Session ${sessionId} created from ${files.length} file(s), ${index.size()} passages`);

            const response: UploadResponse = {
                message: `Successfully processed ${files.length} file(s).`,
                session_id: sessionId,
            };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /query
     *
     * Answers a free-text question from the session's documents.
     */
    app.post('/query', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const validation = validateQueryRequest(req.body);
            if (!validation.valid) {
                res.status(400).json({
                    error: validation.error,
                    code: 'INVALID_QUERY',
                });
                return;
            }

            const { query, session_id: sessionId } = validation.value;
            const index = await sessionStore.get(sessionId);
            if (!index) {
                throw new SessionNotFoundError(sessionId);
            }

            const response: QueryResponse = {
                answer: await ragEngine.answer(index, query),
            };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        console.error(`Error handling ${req.method} ${req.path}:`, err);

        const { statusCode, body } = toErrorResponse(err);
        res.status(statusCode).json(body);
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @returns The listening HTTP server
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            console.log(`Policy QA server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/health`);
            resolve(server);
        });
        server.on('error', reject);
    });
}
