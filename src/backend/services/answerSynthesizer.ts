/**
 * Answer Synthesizer
 *
 * The "generate" half of RAG. Builds the prompt, makes one generation call
 * (retried under the shared policy), joins streamed fragments, and maps the
 * reference markers the model used back to the chunks they tag.
 *
 * The prompt structure:
 * 1. Instructions (answer from the context only, cite with markers)
 * 2. Tagged context, or an explicit "no context" block
 * 3. Conversation history (for continuity, not as a source of facts)
 * 4. The question
 */

import { GenerationProvider } from '../clients/types';
import { isTransientProviderError } from '../clients/failures';
import { AnswerGenerationError } from '../errors';
import {
  AnswerResult,
  AnswerSpan,
  ChatMessage,
  Citation,
  CitationMap,
  GenerationOutput,
} from '../../shared/types';
import { createLogger } from '../utils/logger';
import { RetryAbortedError, RetryPolicy } from '../utils/retryPolicy';

const log = createLogger('answers');

export interface AnswerRequest {
  question: string;
  context: { context: string; citations: CitationMap };
  history?: ChatMessage[];
  signal?: AbortSignal;
  /** Receives the answer text as it is generated */
  onFragment?: (fragment: string) => void;
}

export interface AnswerSynthesizerConfig {
  /** Turns of history included in the prompt */
  historyTurns: number;
  temperature?: number;
  maxTokens?: number;
}

export const DEFAULT_ANSWER_CONFIG: AnswerSynthesizerConfig = {
  historyTurns: 4,
};

const INSTRUCTIONS = `You are a helpful assistant that ONLY answers questions based on the provided context.

RULES:
1. ONLY use information from the CONTEXT section below.
2. Every passage in the context starts with a reference marker such as [1]. Cite the passages you use with their markers, e.g. [1] or [1, 2].
3. If the context does not contain the answer, say that you don't know. Do not guess.
4. The CONVERSATION HISTORY is only for understanding follow-up questions. Do not use earlier answers as facts.`;

/**
 * Marker groups like "[2]" or "[1, 3]".
 */
const MARKER_PATTERN = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

/**
 * A sentence: everything up to and including a run of terminators, or up
 * to a line break or the end of the text.
 */
const SENTENCE_PATTERN = /[^.!?\n]+(?:[.!?]+|(?=\n)|$)/g;

/**
 * Builds the generation prompt. The same inputs always give the same prompt.
 */
export function buildPrompt(question: string, context: string, history: ChatMessage[]): string {
  const parts: string[] = [INSTRUCTIONS];

  if (context.length > 0) {
    parts.push('\n--- CONTEXT ---');
    parts.push(context);
    parts.push('--- END CONTEXT ---\n');
  } else {
    parts.push('\n--- NO CONTEXT AVAILABLE ---');
    parts.push('No passage in the document collection matched this question.');
    parts.push('--- END ---\n');
  }

  if (history.length > 0) {
    parts.push('--- CONVERSATION HISTORY (for reference only) ---');
    for (const message of history) {
      const role = message.role === 'user' ? 'User' : 'Assistant';
      parts.push(`${role}: ${message.text}`);
    }
    parts.push('--- END HISTORY ---\n');
  }

  parts.push(`Question: ${question}`);
  parts.push('\nAnswer:');

  return parts.join('\n');
}

/**
 * Joins generation output into one string, keeping fragment order.
 */
export async function collectOutput(output: GenerationOutput): Promise<string> {
  if (typeof output === 'string') {
    return output;
  }
  let text = '';
  for await (const fragment of output) {
    text += fragment;
  }
  return text;
}

/**
 * Like collectOutput, but hands every non-empty fragment to `onFragment`
 * as soon as it arrives.
 */
export async function relayOutput(output: GenerationOutput, onFragment: (fragment: string) => void): Promise<string> {
  if (typeof output === 'string') {
    if (output.length > 0) {
      onFragment(output);
    }
    return output;
  }
  let text = '';
  for await (const fragment of output) {
    if (fragment.length > 0) {
      onFragment(fragment);
    }
    text += fragment;
  }
  return text;
}

/**
 * Markers found in the text, in order of first appearance, without repeats.
 */
export function extractMarkers(text: string): string[] {
  const markers: string[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    const numbers = (match[1] ?? '').split(',').map((part) => part.trim());
    for (const number of numbers) {
      const marker = `[${Number(number)}]`;
      if (!markers.includes(marker)) {
        markers.push(marker);
      }
    }
  }
  return markers;
}

/**
 * Splits the answer into sentences and attaches the chunks each one cites.
 */
export function buildSpans(text: string, citations: CitationMap): AnswerSpan[] {
  const spans: AnswerSpan[] = [];
  for (const match of text.matchAll(SENTENCE_PATTERN)) {
    const raw = match[0];
    const sentence = raw.trim();
    if (sentence.length === 0) {
      continue;
    }
    const start = (match.index ?? 0) + (raw.length - raw.trimStart().length);
    const chunkIds: string[] = [];
    for (const marker of extractMarkers(sentence)) {
      const citation = citations.get(marker);
      if (citation && !chunkIds.includes(citation.chunkId)) {
        chunkIds.push(citation.chunkId);
      }
    }
    spans.push({ text: sentence, start, end: start + sentence.length, chunkIds });
  }
  return spans;
}

/**
 * Sources the answer rests on: the cited ones in order of first citation,
 * or every context chunk when the model cited none.
 */
export function selectSources(text: string, citations: CitationMap): Citation[] {
  const cited: Citation[] = [];
  for (const marker of extractMarkers(text)) {
    const citation = citations.get(marker);
    if (citation) {
      cited.push(citation);
    }
  }
  return cited.length > 0 ? cited : Array.from(citations.values());
}

/**
 * 0.7 x best score (clamped to 0..1) + 0.3 x min(sources / 3, 1).
 * Zero when nothing supports the answer.
 */
export function calculateConfidence(sources: Citation[]): number {
  if (sources.length === 0) {
    return 0;
  }
  const best = Math.max(...sources.map((source) => source.score));
  const clamped = Math.min(Math.max(best, 0), 1);
  return 0.7 * clamped + 0.3 * Math.min(sources.length / 3, 1);
}

export class AnswerSynthesizer {
  private readonly config: AnswerSynthesizerConfig;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly provider: GenerationProvider,
    retryPolicy: RetryPolicy,
    config: Partial<AnswerSynthesizerConfig> = {}
  ) {
    this.config = { ...DEFAULT_ANSWER_CONFIG, ...config };
    this.retryPolicy = retryPolicy.withPredicate(isTransientProviderError);
  }

  /**
   * Generates an answer grounded in the given context.
   *
   * With `onFragment`, text is relayed while it is generated. Once any
   * text has been relayed a failure is final: a retry would repeat it.
   */
  async answer(request: AnswerRequest): Promise<AnswerResult> {
    const history = this.config.historyTurns > 0 ? (request.history ?? []).slice(-this.config.historyTurns) : [];
    const prompt = buildPrompt(request.question, request.context.context, history);
    const onFragment = request.onFragment;
    let relayed = false;

    let text: string;
    try {
      text = await this.retryPolicy.execute(
        async () => {
          try {
            const output = await this.provider.generate(prompt, {
              signal: request.signal,
              temperature: this.config.temperature,
              maxTokens: this.config.maxTokens,
            });
            if (!onFragment) {
              return await collectOutput(output);
            }
            return await relayOutput(output, (fragment) => {
              relayed = true;
              onFragment(fragment);
            });
          } catch (error) {
            if (relayed) {
              throw new AnswerGenerationError(`Answer stream interrupted: ${errorMessage(error)}`, false, {
                cause: error,
              });
            }
            throw error;
          }
        },
        {
          signal: request.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn('Generation failed, retrying', { attempt, delayMs, error });
          },
        }
      );
    } catch (error) {
      throw this.wrapError(error);
    }

    const citations = request.context.citations;
    const answerText = text.trim();
    const sources = selectSources(answerText, citations);

    return {
      text: answerText,
      sources,
      spans: buildSpans(answerText, citations),
      confidence: calculateConfidence(sources),
    };
  }

  private wrapError(error: unknown): AnswerGenerationError {
    if (error instanceof AnswerGenerationError) {
      return error;
    }
    if (error instanceof RetryAbortedError) {
      return new AnswerGenerationError('Answer generation cancelled', false, { cause: error });
    }
    return new AnswerGenerationError(`Answer generation failed: ${errorMessage(error)}`, isTransientProviderError(error), {
      cause: error,
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
