/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: The ingestion and query pipeline
 * - clients/: External service clients (GeminiClient)
 *
 * When run directly, this file loads the configuration, indexes the policy
 * corpus and starts the server. When imported, it exports the building blocks.
 */

import { AppConfig, loadConfigFromEnvironment } from './config';
import { createGeminiClient } from './clients/geminiClient';
import { createApp, startServer } from './server';
import {
    FixedCorpus,
    createDocumentIngestor,
    createRAGEngine,
    createSessionStore,
} from './services';

export { createApp, startServer, toErrorResponse, DEFAULT_SERVER_CONFIG } from './server';

export type { ServerConfig } from './server';

export * from './services';

export * from './errors';

export { loadConfig, loadConfigFromEnvironment, DEFAULT_APP_CONFIG } from './config';

export type { AppConfig } from './config';

export {
    GeminiClient,
    createGeminiClient,
    GeminiError,
    GeminiErrorCode,
    DEFAULT_GEMINI_CONFIG,
} from './clients/geminiClient';

export type {
    GeminiClientConfig,
    IGeminiClient,
    EmbeddingProvider,
    CompletionProvider,
} from './clients/geminiClient';

/**
 * Wires every collaborator from the config, loads the fixed corpus and
 * starts listening.
 */
export async function bootstrap(config: AppConfig): Promise<void> {
    const geminiClient = createGeminiClient({
        apiKey: config.apiKey,
        defaultModel: config.generationModel,
        embeddingModel: config.embeddingModel,
        timeoutMs: config.requestTimeoutMs,
    });
    const ragEngine = createRAGEngine(geminiClient, geminiClient, {
        topK: config.topK,
        chunking: { chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap },
    });
    const documentIngestor = createDocumentIngestor();

    const corpus = new FixedCorpus(config.policyDocsDir, documentIngestor, ragEngine);
    await corpus.load();

    const app = createApp({
        port: config.port,
        corsOrigin: config.corsOrigin,
        uploadDir: config.uploadDir,
        maxUploadBytes: config.maxUploadBytes,
        geminiClient,
        ragEngine,
        documentIngestor,
        corpus,
        sessionStore: createSessionStore({
            maxSessions: config.maxSessions,
            ttlMs: config.sessionTtlMs,
        }),
    });

    await startServer(app, config.port);
}

// Main entry point - start server when run directly
if (require.main === module) {
    bootstrap(loadConfigFromEnvironment())
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: Error) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}
