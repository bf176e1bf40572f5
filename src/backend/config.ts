/**
 * Application configuration.
 *
 * Values come from the environment (optionally a .env file loaded through
 * dotenv) and are read once at process start. Downstream components take
 * their own typed config objects; this module only maps variables to them.
 */

import * as os from 'os';
import * as path from 'path';
import dotenv from 'dotenv';

export interface AppConfig {
    port: number;
    corsOrigin: string;
    /** Credential for the hosted embedding and generation models */
    apiKey: string | undefined;
    generationModel: string;
    embeddingModel: string;
    /** Directory holding the policy PDFs indexed at startup */
    policyDocsDir: string;
    /** Temporary directory for uploaded files */
    uploadDir: string;
    maxUploadBytes: number;
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    maxSessions: number;
    sessionTtlMs: number;
    requestTimeoutMs: number;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
    port: 3001,
    corsOrigin: '*',
    apiKey: undefined,
    generationModel: 'gemini-2.0-flash',
    embeddingModel: 'text-embedding-004',
    policyDocsDir: 'policy_docs',
    uploadDir: path.join(os.tmpdir(), 'policy-qa-uploads'),
    maxUploadBytes: 10 * 1024 * 1024,
    chunkSize: 1000,
    chunkOverlap: 100,
    topK: 4,
    maxSessions: 100,
    sessionTtlMs: 60 * 60 * 1000,
    requestTimeoutMs: 60_000,
};

type Env = Record<string, string | undefined>;

/**
 * Parses an integer variable, falling back to the default when it is unset,
 * not an integer, or below `min`.
 */
function readInt(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name]?.trim();
    if (!raw) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        console.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
        return fallback;
    }
    return value;
}

function readString(env: Env, name: string, fallback: string): string {
    return env[name]?.trim() || fallback;
}

/**
 * Builds the application config from environment variables.
 *
 * A missing API key is logged but does not abort startup; requests that
 * need the model will fail with an upstream error instead.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const apiKey = env.GOOGLE_API_KEY?.trim() || undefined;
    if (apiKey) {
        console.log('API key loaded successfully.');
    } else {
        console.error('GOOGLE_API_KEY is not set. Embedding and generation requests will fail.');
    }

    const defaults = DEFAULT_APP_CONFIG;

    const chunkSize = readInt(env, 'CHUNK_SIZE', defaults.chunkSize, 1);
    let chunkOverlap = readInt(env, 'CHUNK_OVERLAP', defaults.chunkOverlap);
    if (chunkOverlap >= chunkSize) {
        const fallback = Math.min(defaults.chunkOverlap, chunkSize - 1);
        console.warn(
            `Ignoring CHUNK_OVERLAP=${chunkOverlap}, it must be smaller than CHUNK_SIZE=${chunkSize}. Using ${fallback}`
        );
        chunkOverlap = fallback;
    }

    return {
        port: readInt(env, 'PORT', defaults.port),
        corsOrigin: readString(env, 'CORS_ORIGIN', defaults.corsOrigin),
        apiKey,
        generationModel: readString(env, 'GEMINI_MODEL', defaults.generationModel),
        embeddingModel: readString(env, 'EMBEDDING_MODEL', defaults.embeddingModel),
        policyDocsDir: readString(env, 'POLICY_DOCS_DIR', defaults.policyDocsDir),
        uploadDir: readString(env, 'UPLOAD_DIR', defaults.uploadDir),
        maxUploadBytes: readInt(env, 'MAX_UPLOAD_BYTES', defaults.maxUploadBytes, 1),
        chunkSize,
        chunkOverlap,
        topK: readInt(env, 'TOP_K', defaults.topK, 1),
        maxSessions: readInt(env, 'MAX_SESSIONS', defaults.maxSessions, 1),
        sessionTtlMs: readInt(env, 'SESSION_TTL_MS', defaults.sessionTtlMs),
        requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', defaults.requestTimeoutMs, 1),
    };
}

/**
 * Loads .env (if present) into process.env, then reads the config.
 */
export function loadConfigFromEnvironment(): AppConfig {
    dotenv.config();
    return loadConfig(process.env);
}
