import { KBConfig } from '../config.js';
import { GenerationError, errorMessage } from '../errors.js';
import { SearchResult } from '../types.js';

export interface AnswerGenerator {
  generate(query: string, context: SearchResult[]): Promise<string>;
}

const MAX_BULLET_LEN = 200;
const MAX_BULLETS = 5;

/* ------------------------------------------------------------------ */
/*  Prompting                                                          */
/* ------------------------------------------------------------------ */

export function institutionBlurb(institution: string): string {
  return `General information about ${institution}, an engineering institution offering undergraduate and postgraduate programs.`;
}

export function buildPrompt(query: string, context: SearchResult[], institution: string, maxChunks = 3): string {
  const used = context.slice(0, maxChunks);
  const info = used.length > 0 ? used.map((c, i) => `Information ${i + 1}: ${c.text}`).join('\n\n') : institutionBlurb(institution);

  return [
    `You are a helpful assistant for ${institution}.`,
    '',
    `QUESTION: ${query}`,
    '',
    'AVAILABLE INFORMATION:',
    info,
    '',
    'INSTRUCTIONS:',
    '1. Answer clearly and concisely using the information available',
    '2. Be conversational and friendly',
    '3. Break the answer into short sections and highlight important points',
    '4. Do NOT include source citations, references or links',
    "5. If the information does not cover the question, say so and offer general guidance"
  ].join('\n');
}

export function systemPrompt(institution: string): string {
  return [
    `You are a helpful assistant for ${institution}. Follow these rules:`,
    '1. Only use information from the provided context',
    '2. Be conversational and friendly',
    '3. Do NOT include any source citations, references or links',
    '4. Break the answer into clear sections'
  ].join('\n');
}

/** Removes source sections, markdown links and `Source:` lines a model may add despite instructions. */
export function stripSourceCitations(answer: string): string {
  return answer
    .replace(/\*\*Sources[\s\S]*?\*\*[\s\S]*?(?=\n\n|$)/g, '')
    .replace(/Sources Used:[\s\S]*?(?=\n\n|$)/g, '')
    .replace(/\[.*?\]\(.*?\)/g, '')
    .replace(/Source:.*?\n/g, '')
    .trim();
}

/* ------------------------------------------------------------------ */
/*  Hosted chat completions (Groq, OpenAI-compatible)                  */
/* ------------------------------------------------------------------ */

interface ChatCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

function isChatCompletion(value: unknown): value is ChatCompletionResponse {
  if (!value || typeof value !== 'object' || !('choices' in value)) return false;
  return Array.isArray(value.choices);
}

export class GroqGenerator implements AnswerGenerator {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly institution: string,
    private readonly maxPromptChunks = 3,
    private readonly baseUrl = 'https://api.groq.com/openai/v1'
  ) {}

  async generate(query: string, context: SearchResult[]): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt(this.institution) },
            { role: 'user', content: buildPrompt(query, context, this.institution, this.maxPromptChunks) }
          ],
          temperature: 0.4,
          max_tokens: 1200
        })
      });
    } catch (error) {
      throw new GenerationError(`Answer generation request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) throw new GenerationError(`Answer generation failed with status ${res.status}`);

    const json: unknown = await res.json();
    const content = isChatCompletion(json) ? json.choices[0]?.message?.content : undefined;
    const answer = stripSourceCitations(content ?? '');
    if (!answer) throw new GenerationError('Answer generator returned an empty response');
    return answer;
  }
}

/* ------------------------------------------------------------------ */
/*  Offline extractive answers                                         */
/* ------------------------------------------------------------------ */

const ABBREV = /(?:Mr|Mrs|Ms|Dr|Jr|Sr|Inc|Ltd|Co|vs|etc|e\.g|i\.e|approx|dept|est|govt|Prof|St)\.$/i;

export function splitSentences(text: string): string[] {
  const raw = text.split(/(?<=[.!?])\s+/);
  const merged: string[] = [];

  for (const seg of raw) {
    const trimmed = seg.trim();
    if (!trimmed) continue;
    if (merged.length > 0 && ABBREV.test(merged[merged.length - 1])) {
      merged[merged.length - 1] += ' ' + trimmed;
    } else {
      merged.push(trimmed);
    }
  }
  return merged.filter((s) => s.length >= 10);
}

function normalizeForDedup(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{M}\p{N}]/gu, '');
}

export function deduplicateSpans(spans: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const span of spans) {
    const key = normalizeForDedup(span);
    // a span without letters or digits has no key to compare
    if (!key) {
      result.push(span);
      continue;
    }
    let isDup = seen.has(key);
    if (!isDup) {
      for (const prev of seen) {
        if (prev.includes(key) || key.includes(prev)) {
          isDup = true;
          break;
        }
      }
    }
    if (!isDup) {
      seen.add(key);
      result.push(span);
    }
  }
  return result;
}

const STOPWORDS = new Set(['what', 'is', 'the', 'a', 'an', 'of', 'and', 'or', 'for', 'to', 'in', 'on', 'how', 'do', 'does', 'are', 'about', 'there', 'any', 'can', 'this', 'that', 'with']);

function queryTerms(question: string): string[] {
  return question
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s]/gu, '')
    .split(/\s+/)
    .filter((w) => w.length > 2 && !STOPWORDS.has(w));
}

export function truncateBullet(text: string, maxLen: number = MAX_BULLET_LEN): string {
  if (text.length <= maxLen) return text;
  const cut = text.slice(0, maxLen);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > maxLen * 0.5 ? cut.slice(0, lastSpace) : cut) + '...';
}

/**
 * Picks the sentences that best match the question from the context chunks,
 * weighting each by its chunk's relevance. Used when no hosted model is configured.
 */
export function extractKeySentences(question: string, context: SearchResult[], maxSentences = MAX_BULLETS): string[] {
  const terms = queryTerms(question);
  const scored: Array<{ text: string; score: number }> = [];

  for (const chunk of context) {
    const sentences = splitSentences(chunk.text);
    sentences.forEach((s, i) => {
      const lower = s.toLowerCase();
      const hits = terms.filter((t) => lower.includes(t)).length;
      const termScore = terms.length > 0 ? hits / terms.length : 0;
      const positionBoost = 1 - (i / Math.max(sentences.length, 1)) * 0.3;
      scored.push({ text: s, score: (chunk.relevanceScore * 0.5 + termScore * 0.5) * positionBoost });
    });
  }

  scored.sort((a, b) => b.score - a.score);
  return deduplicateSpans(scored.map((s) => s.text)).slice(0, maxSentences);
}

export class ExtractiveGenerator implements AnswerGenerator {
  constructor(private readonly institution: string) {}

  async generate(query: string, context: SearchResult[]): Promise<string> {
    const sentences = extractKeySentences(query, context);
    if (sentences.length === 0) {
      return `${institutionBlurb(this.institution)} I could not find specific details about that.`;
    }
    return [`Here is what I found about ${this.institution}:`, '', ...sentences.map((s) => `- ${truncateBullet(s)}`)].join('\n');
  }
}

export function createGenerator(config: KBConfig): AnswerGenerator {
  if (config.groqApiKey) {
    return new GroqGenerator(config.groqApiKey, config.groqModel, config.anchorPhrase, config.maxPromptChunks);
  }
  return new ExtractiveGenerator(config.anchorPhrase);
}
