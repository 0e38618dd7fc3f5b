import { z } from 'zod';
import { relevanceRequestSchema } from '@driftguard/contracts';
import type { LLMProvider, RelevanceOracle, RelevanceRequest, RelevanceVerdict } from '@driftguard/contracts';
import type { Logger } from '@driftguard/enforcement';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'this', 'that', 'from', 'have', 'some',
  'work', 'working', 'doing', 'make', 'get', 'use', 'using', 'look',
  'find', 'check', 'need', 'want', 'will', 'can', 'all', 'any', 'more',
]);

const SYSTEM_PROMPT = [
  "Decide whether the user's current activity (a webpage or a desktop application) directly serves their current task.",
  'Read the task title literally: it names a specific project, topic or activity. Do not stretch it into a general concept.',
  'Relevant: tools, documentation, code, research, forums and resources that directly help with that task.',
  'Not relevant: entertainment, news, social media, videos, or anything that needs a chain of reasoning to connect to the task.',
  'If the activity is what the task title literally describes (for example "reading news" and a news site), it is relevant.',
  'Respond ONLY with JSON {"relevant": boolean, "confidence": 0..100, "reason": "one sentence"}.',
].join('\n');

const llmVerdictSchema = z.object({
  relevant: z.boolean(),
  confidence: z.coerce.number().default(0),
  reason: z.string().default(''),
});

export const keywords = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(word => word.length >= 3 && !STOP_WORDS.has(word));

/** Shared stems of three or more characters count as overlap ("taxes" and "tax"). */
export const hasKeywordOverlap = (intention: string, title: string): boolean => {
  const titleWords = keywords(title);
  return keywords(intention).some(word => titleWords.some(other => word.startsWith(other) || other.startsWith(word)));
};

export const cleanTitle = (title: string): string =>
  title.replace(/&[a-zA-Z0-9#]+;/g, ' ').replace(/[®™]/g, '').trim();

/** Pulls the first JSON object out of a model reply that may wrap it in prose or code fences. */
export const extractJsonObject = (content: string): unknown => {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) throw new Error('No JSON object in model reply');
  return JSON.parse(content.slice(start, end + 1));
};

export type RelevanceScorerOptions = {
  llm: LLMProvider | null;
  model: string;
  timeoutMs: number;
  deterministicOnly?: boolean;
  cacheLimit?: number;
  logger: Logger;
};

export class RelevanceScorer implements RelevanceOracle {
  private cache: Map<string, RelevanceVerdict> = new Map();
  private approved: Set<string> = new Set();
  private currentIntention = '';

  constructor(private readonly options: RelevanceScorerOptions) {}

  /** Never rejects: any failure scores the content as relevant with zero confidence. */
  async score(request: RelevanceRequest): Promise<RelevanceVerdict> {
    try {
      return await this.scoreStrict(request);
    } catch (error) {
      this.options.logger.warn(`Scoring failed for "${request.title}": ${error instanceof Error ? error.message : String(error)}`);
      return { relevant: true, confidence: 0, reason: 'Scoring unavailable' };
    }
  }

  /** Rejects when no verdict can be produced. */
  async scoreStrict(input: RelevanceRequest): Promise<RelevanceVerdict> {
    const request = relevanceRequestSchema.parse(input);
    if (hasKeywordOverlap(request.intention, request.title)) {
      return { relevant: true, confidence: 95, reason: 'Keyword match with task' };
    }
    if (this.approved.has(approvalKey(request.intention, request.title))) {
      return { relevant: true, confidence: 100, reason: 'User-approved' };
    }
    const key = cacheKey(request);
    const cached = this.cache.get(key);
    if (cached) return cached;

    if (request.intention !== this.currentIntention) {
      this.cache.clear();
      this.currentIntention = request.intention;
    }
    const { llm, deterministicOnly } = this.options;
    if (deterministicOnly || !llm) throw new Error('No language model available');

    const verdict = await this.ask(llm, request);
    this.remember(key, verdict);
    return verdict;
  }

  approve(title: string, intention: string): void {
    this.approved.add(approvalKey(intention, title));
    this.options.logger.info(`User approved "${title}" for "${intention}"`);
  }

  clear(): void {
    this.cache.clear();
    this.approved.clear();
    this.currentIntention = '';
    this.options.logger.debug('Relevance cache cleared');
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async ask(llm: LLMProvider, request: RelevanceRequest): Promise<RelevanceVerdict> {
    const label = request.contentType === 'application' ? 'Application in use' : 'Webpage title';
    const description = request.description ? `\nBlock description: ${request.description}` : '';
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const result = await llm.chat({
        model: this.options.model,
        temperature: 0,
        maxTokens: 120,
        signal: controller.signal,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: `Current time block task: "${request.intention}"${description}\n${label}: "${cleanTitle(request.title)}"`,
          },
        ],
      });
      const parsed = llmVerdictSchema.parse(extractJsonObject(result.content));
      return {
        relevant: parsed.relevant,
        confidence: Math.round(Math.min(100, Math.max(0, parsed.confidence))),
        reason: parsed.reason,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private remember(key: string, verdict: RelevanceVerdict): void {
    this.cache.set(key, verdict);
    if (this.cache.size > (this.options.cacheLimit ?? 500)) {
      // Drop oldest entry
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) this.cache.delete(oldest);
    }
  }
}

const approvalKey = (intention: string, title: string): string => `${intention}|${title}`;

const cacheKey = (request: RelevanceRequest): string => `${request.intention}|${request.description}|${request.title}`;
