/**
 * Analyze agenda text with an LLM
 *
 * One prompt, one model call. The response is parsed leniently: a reply that
 * cannot be read as JSON comes back as a result with `error` set rather than
 * as an exception. Only failures to reach the model throw.
 */

import OpenAI from 'openai';
import { MAX_ANALYSIS_CHARS, RAW_PREVIEW_CHARS } from './config.js';
import { AnalysisError, errorMessage } from './errors.js';
import { normalizeAnalyzedItem } from './records.js';
import { DECISIONS, ITEM_STATUSES, TOPICS, type AnalysisResult, type AnalyzedItem } from './types.js';
import type { Logger } from './logger.js';

/**
 * Text-in, text-out model access
 */
export interface ModelClient {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

export class OpenAIModelClient implements ModelClient {
  constructor(
    private readonly openai: OpenAI,
    readonly model: string,
    private readonly maxTokens: number
  ) {}

  async complete(prompt: string): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      max_completion_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: prompt
        }
      ]
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No text response from OpenAI');
    }
    return content;
  }
}

/**
 * Build the analysis prompt for a document
 */
export function buildAnalysisPrompt(text: string, docType: string): string {
  return `You are analyzing a city council ${docType} for citizens who want to stay informed.

Extract DETAILED, SPECIFIC information for each significant agenda item.

For EACH item, provide:
1. item_id: The "Item ID" shown above the item in the document, copied exactly (omit if there is none)
2. title: The item's title as written in the document
3. topic: One of ${TOPICS.join(', ')}
4. relevance: 1-5 (5 = highest public interest)
5. summary: 2-3 sentences
6. key_details: Bullet points of specific facts (dollar amounts, locations, timelines)
7. why_it_matters: One sentence on citizen impact
8. status: ${ITEM_STATUSES.join(', ')}
9. decision: ${DECISIONS.join('/')} (if applicable, otherwise null)
10. economic_axis: -5 (left) to +5 (right), 0 = neutral
11. social_axis: -5 (libertarian) to +5 (authoritarian), 0 = neutral

Respond in this exact JSON format:
{
  "summary": "Overview of the ${docType}",
  "items": [
    {
      "item_id": "...",
      "title": "...",
      "topic": "zoning",
      "relevance": 3,
      "summary": "...",
      "key_details": ["..."],
      "why_it_matters": "...",
      "status": "first_reading",
      "decision": "pending",
      "economic_axis": 0,
      "social_axis": 0
    }
  ],
  "notable_items": ["..."]
}

Document text:
${text.slice(0, MAX_ANALYSIS_CHARS)}`;
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return value && typeof value === 'object' && !Array.isArray(value) ? { ...value } : null;
}

/**
 * Turn a model reply into an `AnalysisResult`.
 *
 * Tries the whole reply as JSON, then the span from the first `{` to the
 * last `}`. If neither parses, returns a result with `error` and `raw` set.
 */
export function parseAnalysisResponse(responseText: string, model: string): AnalysisResult {
  let parsed = parseJsonObject(responseText);

  if (!parsed) {
    const start = responseText.indexOf('{');
    const end = responseText.lastIndexOf('}');
    if (start >= 0 && end > start) {
      parsed = parseJsonObject(responseText.slice(start, end + 1));
    }
  }

  if (!parsed) {
    return {
      summary: '',
      items: [],
      notable_items: [],
      model,
      error: 'Failed to parse response',
      raw: responseText.slice(0, RAW_PREVIEW_CHARS)
    };
  }

  const data: Record<string, unknown> = parsed;
  const items: AnalyzedItem[] = [];
  if (Array.isArray(data.items)) {
    for (const candidate of data.items) {
      const item = normalizeAnalyzedItem(candidate);
      if (item) items.push(item);
    }
  }

  const result: AnalysisResult = {
    summary: typeof data.summary === 'string' ? data.summary : '',
    items,
    notable_items: Array.isArray(data.notable_items)
      ? data.notable_items.filter((n): n is string => typeof n === 'string')
      : [],
    model
  };
  if (typeof data.error === 'string') {
    result.error = data.error;
  }
  return result;
}

export class Analyzer {
  private readonly logger: Logger;

  constructor(
    private readonly client: ModelClient,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'analyzer' });
  }

  /**
   * Analyze a document. Text beyond MAX_ANALYSIS_CHARS is not sent.
   */
  async analyze(text: string, docType: string = 'agenda'): Promise<AnalysisResult> {
    const prompt = buildAnalysisPrompt(text, docType);

    let responseText: string;
    try {
      responseText = await this.client.complete(prompt);
    } catch (err) {
      this.logger.error({ model: this.client.model, error: errorMessage(err) }, 'Model invocation failed');
      throw new AnalysisError(`Model call failed: ${errorMessage(err)}`, { cause: err });
    }

    const result = parseAnalysisResponse(responseText, this.client.model);
    if (result.error) {
      this.logger.warn({ model: this.client.model, error: result.error }, 'Could not parse analysis JSON');
    }
    return result;
  }
}

/**
 * Production analyzer backed by the OpenAI chat completions API
 */
export function createOpenAIAnalyzer(
  config: { apiKey?: string; model: string; maxTokens: number },
  logger: Logger
): Analyzer {
  const openai = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  return new Analyzer(new OpenAIModelClient(openai, config.model, config.maxTokens), logger);
}
