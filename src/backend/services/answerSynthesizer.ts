/**
 * Answer Synthesizer Service
 *
 * This is the "augment + generate" half of RAG: retrieved passages and the
 * user's query go into one prompt template, the LLM is called once, and the
 * reply is returned as text (answer mode) or parsed into a verdict
 * (evaluation mode).
 *
 * Both modes share the template below so that the grounding rules cannot
 * drift apart between the two endpoints.
 */

import { EvaluationResult, Passage, SynthesisMode } from '../../shared/types';
import { CompletionProvider } from '../clients/geminiClient';
import { UpstreamUnavailableError, asError } from '../errors';
import { parseEvaluation } from './modelOutputParser';

export const EMPTY_ANSWER_PLACEHOLDER = 'I could not find an answer in the provided documents.';

/**
 * Per-mode pieces of the prompt.
 */
const MODE_INSTRUCTIONS: Record<SynthesisMode, { role: string; task: string; contextLabel: string; queryLabel: string }> = {
    answer: {
        role: 'You are a helpful assistant answering questions about the documents a user uploaded.',
        contextLabel: 'Here are the relevant document excerpts:',
        queryLabel: "Here is the user's question:",
        task: `Answer the question in plain text.
If the excerpts do not contain the answer, say that the documents do not cover it.`,
    },
    evaluation: {
        role: "You are an expert insurance claim evaluator. Your task is to analyze a user's query against a set of relevant insurance policy clauses and determine if the claim should be approved.",
        contextLabel: 'Here are the relevant policy clauses:',
        queryLabel: "Here is the user's claim query:",
        task: `Perform the following steps:
1. Evaluate the query against the clauses.
2. Determine a final decision: "Approved" or "Rejected".
3. If approved, state the payout amount or coverage percentage if specified in the clauses. If no amount is specified, use "Not Applicable".
4. Provide a clear justification for your decision by referencing the specific clause(s) used.

Return your final answer as a single, clean JSON object with no other text before or after it. The JSON object must have these exact keys: "decision", "amount", "justification".`,
    },
};

/**
 * Joins passage texts, in retrieval order, into one context block.
 */
export function buildContext(passages: Passage[]): string {
    return passages.map((passage) => passage.content).join('\n');
}

/**
 * Builds the prompt for either mode.
 */
export function buildPrompt(mode: SynthesisMode, context: string, query: string): string {
    const instructions = MODE_INSTRUCTIONS[mode];

    return `${instructions.role}

${instructions.contextLabel}
---
${context}
---

${instructions.queryLabel}
---
${query}
---

Based *only* on the given context and the user's query, without using outside knowledge:
${instructions.task}`;
}

export class AnswerSynthesizer {
    constructor(private readonly llm: CompletionProvider) {}

    /**
     * Free-text answer. The reply is returned verbatim.
     */
    async answer(passages: Passage[], query: string): Promise<string> {
        const raw = await this.complete(buildPrompt('answer', buildContext(passages), query));
        return raw.trim().length > 0 ? raw : EMPTY_ANSWER_PLACEHOLDER;
    }

    /**
     * Claim evaluation.
     *
     * @throws MalformedModelOutputError if the reply holds no valid verdict
     */
    async evaluate(passages: Passage[], query: string): Promise<EvaluationResult> {
        const raw = await this.complete(buildPrompt('evaluation', buildContext(passages), query));

        const outcome = parseEvaluation(raw);
        if (!outcome.ok) {
            throw outcome.error;
        }
        return outcome.value;
    }

    private async complete(prompt: string): Promise<string> {
        try {
            return await this.llm.generateCompletion(prompt, { temperature: 0 });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new UpstreamUnavailableError(`Language model unavailable: ${message}`, asError(error));
        }
    }
}

export function createAnswerSynthesizer(llm: CompletionProvider): AnswerSynthesizer {
    return new AnswerSynthesizer(llm);
}
