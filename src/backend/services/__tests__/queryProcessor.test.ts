/**
 * Unit tests for Query Processor
 *
 * Tests the validateQuery function to ensure it correctly:
 * - Accepts valid queries
 * - Rejects missing, non-string and whitespace-only queries
 *
 * Tests the request validators for POST /evaluate and POST /query.
 */

import * as fc from 'fast-check';
import { validateEvaluateRequest, validateQuery, validateQueryRequest } from '../queryProcessor';

describe('validateQuery', () => {
    describe('valid queries', () => {
        it('should accept a simple text query', () => {
            const result = validateQuery('Is dental surgery covered?');
            expect(result.valid).toBe(true);
            expect(result.error).toBeUndefined();
        });

        it('should accept a query with leading/trailing spaces (content exists)', () => {
            const result = validateQuery('  46M, knee surgery, Pune  ');
            expect(result.valid).toBe(true);
        });

        it('should accept a single character query', () => {
            expect(validateQuery('?').valid).toBe(true);
        });
    });

    describe('invalid queries', () => {
        it('should reject a missing query', () => {
            expect(validateQuery(undefined)).toEqual({
                valid: false,
                error: "Missing 'query' in request body.",
            });
            expect(validateQuery(null).valid).toBe(false);
        });

        it('should reject a non-string query', () => {
            expect(validateQuery(42)).toEqual({ valid: false, error: "'query' must be a string." });
            expect(validateQuery(['dental']).valid).toBe(false);
        });

        it('should reject an empty string', () => {
            expect(validateQuery('')).toEqual({
                valid: false,
                error: 'Query cannot be empty or contain only whitespace',
            });
        });

        it('should reject a string with mixed whitespace', () => {
            expect(validateQuery(' \t \n ').valid).toBe(false);
        });
    });
});

describe('Property-Based Tests', () => {
    describe('Whitespace query rejection', () => {
        const whitespaceOnlyString = fc.stringOf(
            fc.constantFrom(' ', '\t', '\n', '\r', '\f', '\v')
        );

        it('should reject any string composed entirely of whitespace', () => {
            fc.assert(
                fc.property(whitespaceOnlyString, (whitespaceQuery) => {
                    const result = validateQuery(whitespaceQuery);
                    expect(result.valid).toBe(false);
                    expect(result.error).toBeDefined();
                }),
                { numRuns: 100 }
            );
        });

        it('should accept any string that contains at least one non-whitespace character', () => {
            const nonEmptyQuery = fc
                .string({ minLength: 1 })
                .filter((s) => s.trim().length > 0);

            fc.assert(
                fc.property(nonEmptyQuery, (validQuery) => {
                    const result = validateQuery(validQuery);
                    expect(result.valid).toBe(true);
                    expect(result.error).toBeUndefined();
                }),
                { numRuns: 100 }
            );
        });
    });
});

describe('validateEvaluateRequest', () => {
    it('should return the query unchanged', () => {
        expect(validateEvaluateRequest({ query: '  dental?  ' })).toEqual({
            valid: true,
            value: { query: '  dental?  ' },
        });
    });

    it('should reject a body that is not an object', () => {
        expect(validateEvaluateRequest(undefined)).toEqual({
            valid: false,
            error: "Missing 'query' in request body.",
        });
        expect(validateEvaluateRequest(['dental']).valid).toBe(false);
    });

    it('should reject a body without a query', () => {
        expect(validateEvaluateRequest({ question: 'dental?' })).toEqual({
            valid: false,
            error: "Missing 'query' in request body.",
        });
    });
});

describe('validateQueryRequest', () => {
    it('should accept a query with a session id', () => {
        expect(validateQueryRequest({ query: 'What is covered?', session_id: 'abc' })).toEqual({
            valid: true,
            value: { query: 'What is covered?', session_id: 'abc' },
        });
    });

    it('should check the query before the session id', () => {
        expect(validateQueryRequest({ query: '   ' })).toEqual({
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        });
    });

    it('should reject a missing or blank session id', () => {
        const expected = { valid: false, error: "Missing 'session_id' in request body." };

        expect(validateQueryRequest({ query: 'What is covered?' })).toEqual(expected);
        expect(validateQueryRequest({ query: 'What is covered?', session_id: ' ' })).toEqual(expected);
        expect(validateQueryRequest({ query: 'What is covered?', session_id: 7 })).toEqual(expected);
    });
});
