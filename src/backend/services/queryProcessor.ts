/**
 * Query Processor Service
 *
 * Validates request bodies before they reach the pipeline. Bodies arrive
 * as untyped JSON, so each validator narrows `unknown` to the request type.
 *
 * Invalid input never costs an embedding or LLM call.
 */

import { EvaluateRequest, QueryRequest, ValidationResult } from '../../shared/types';

export type RequestValidation<T> =
    | { valid: true; value: T }
    | { valid: false; error: string };

/**
 * Validates a user query before processing.
 *
 * @param query - The raw `query` field from a request body
 * @returns ValidationResult indicating if the query is valid
 */
export function validateQuery(query: unknown): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: "Missing 'query' in request body.",
        };
    }

    if (typeof query !== 'string') {
        return {
            valid: false,
            error: "'query' must be a string.",
        };
    }

    // trim() handles spaces, tabs, newlines, and other whitespace chars
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the body of POST /evaluate.
 */
export function validateEvaluateRequest(body: unknown): RequestValidation<EvaluateRequest> {
    if (!isObject(body)) {
        return { valid: false, error: "Missing 'query' in request body." };
    }

    const query = body.query;
    const result = validateQuery(query);
    if (!result.valid || typeof query !== 'string') {
        return { valid: false, error: result.error ?? "Missing 'query' in request body." };
    }

    return { valid: true, value: { query } };
}

/**
 * Validates the body of POST /query.
 */
export function validateQueryRequest(body: unknown): RequestValidation<QueryRequest> {
    if (!isObject(body)) {
        return { valid: false, error: "Missing 'query' or 'session_id' in request body." };
    }

    const query = body.query;
    const result = validateQuery(query);
    if (!result.valid || typeof query !== 'string') {
        return { valid: false, error: result.error ?? "Missing 'query' in request body." };
    }

    const sessionId = body.session_id;
    if (typeof sessionId !== 'string' || sessionId.trim().length === 0) {
        return { valid: false, error: "Missing 'session_id' in request body." };
    }

    return { valid: true, value: { query, session_id: sessionId } };
}
