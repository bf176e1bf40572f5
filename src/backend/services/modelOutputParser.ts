/**
 * Model Output Parser
 *
 * Turns free-text LLM output into structured data. Models often wrap the
 * requested JSON in prose or markdown fences, so we look for the first
 * balanced brace-delimited object rather than parsing the whole reply.
 *
 * Every function here returns a ParseOutcome instead of throwing; the caller
 * decides how a malformed reply is surfaced.
 */

import { EvaluationDecision, EvaluationResult } from '../../shared/types';
import { MalformedModelOutputError } from '../errors';

export type ParseOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: MalformedModelOutputError };

export const NOT_APPLICABLE = 'Not Applicable';

function ok<T>(value: T): ParseOutcome<T> {
    return { ok: true, value };
}

function fail<T>(message: string, raw: string): ParseOutcome<T> {
    return { ok: false, error: new MalformedModelOutputError(message, raw) };
}

/**
 * Returns the index just past the brace that closes the object opened at
 * `start`, or -1 if it never closes. Braces inside string literals are ignored.
 */
function findObjectEnd(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === '\\') {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) {
                return i + 1;
            }
        }
    }

    return -1;
}

/**
 * Finds the first balanced `{...}` substring, or null if there is none.
 */
export function findBalancedObject(text: string): string | null {
    let start = text.indexOf('{');

    while (start !== -1) {
        const end = findObjectEnd(text, start);
        if (end !== -1) {
            return text.slice(start, end);
        }
        start = text.indexOf('{', start + 1);
    }

    return null;
}

/**
 * Extracts and parses the first JSON object in a model reply.
 */
export function extractJsonObject(raw: string): ParseOutcome<Record<string, unknown>> {
    const candidate = findBalancedObject(raw);
    if (candidate === null) {
        return fail('No JSON object found in model output', raw);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(candidate);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return fail(`Model output contains invalid JSON: ${message}`, raw);
    }

    if (!isRecord(parsed)) {
        return fail('Model output JSON is not an object', raw);
    }

    return ok(parsed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeDecision(value: unknown): EvaluationDecision | undefined {
    if (typeof value !== 'string') {
        return undefined;
    }

    switch (value.trim().toLowerCase()) {
        case 'approved':
            return 'Approved';
        case 'rejected':
            return 'Rejected';
        default:
            return undefined;
    }
}

function normalizeAmount(value: unknown): string | undefined {
    if (value === undefined || value === null) {
        return NOT_APPLICABLE;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === 'string') {
        return value.trim() || NOT_APPLICABLE;
    }
    return undefined;
}

/**
 * Parses a claim-evaluation reply into an EvaluationResult.
 *
 * - decision: "Approved" or "Rejected", any case
 * - amount: string or number; missing, null or blank becomes "Not Applicable"
 * - justification: required string
 */
export function parseEvaluation(raw: string): ParseOutcome<EvaluationResult> {
    const extracted = extractJsonObject(raw);
    if (!extracted.ok) {
        return extracted;
    }

    const data = extracted.value;

    const decision = normalizeDecision(data.decision);
    if (!decision) {
        return fail(`Invalid decision in model output: ${JSON.stringify(data.decision)}`, raw);
    }

    const amount = normalizeAmount(data.amount);
    if (amount === undefined) {
        return fail('Invalid amount in model output', raw);
    }

    if (typeof data.justification !== 'string') {
        return fail('Missing justification in model output', raw);
    }

    return ok({ decision, amount, justification: data.justification });
}
