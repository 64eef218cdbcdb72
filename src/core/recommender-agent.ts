/**
 * Recommender Agent
 *
 * Turns a selected flight, or a free-text question about the loaded flights,
 * into a short recommendation written by a hosted chat model. The question
 * path gives the model a `flight_search` function tool backed by a
 * FlightSearchCapability and runs a bounded tool-call loop.
 *
 * One attempt per call: any model failure or an empty answer raises
 * RecommendationError.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { FilterCriteria, ParsedFlight } from '../types/flights.js';
import { STOPOVER_PREFERENCES, TIME_BUCKETS } from '../types/flights.js';
import { RecommendationError } from '../types/errors.js';
import { FLIGHT_SEARCH_TOOL_NAME, type FlightSearchCapability } from './flight-search-tool.js';
import { parseFilterQuery } from './query-parser.js';
import { missingApiKeyError } from '../utils/error-messages.js';
import { logger } from '../utils/logger.js';

// ============================================
// MODEL SEAM
// ============================================

export interface ChatToolCall {
  id: string;
  name: string;
  /** JSON text, as produced by the model */
  arguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ChatToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema of the arguments object */
  parameters: Record<string, unknown>;
}

export interface ChatCompletion {
  content: string | null;
  toolCalls: ChatToolCall[];
}

export interface LanguageModel {
  complete(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ChatCompletion>;
}

export interface OpenAIChatModelConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

/**
 * Any OpenAI-compatible chat-completions endpoint (Together by default)
 */
export class OpenAIChatModel implements LanguageModel {
  private client: OpenAI | null = null;

  constructor(private readonly config: OpenAIChatModelConfig) {}

  /**
   * Created on first use, so a missing key only fails the calls that need it
   */
  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new RecommendationError(missingApiKeyError());
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey, baseURL: this.config.baseUrl });
    }
    return this.client;
  }

  async complete(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ChatCompletion> {
    const response = await this.getClient().chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      messages: messages.map(toOpenAIMessage),
      tools: tools.length > 0
        ? tools.map((tool) => ({
            type: 'function' as const,
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.parameters,
            },
          }))
        : undefined,
    });

    const message = response.choices[0]?.message;
    return {
      content: message?.content ?? null,
      toolCalls: (message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    case 'assistant': {
      const param: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
        role: 'assistant',
        content: message.content,
      };
      if (message.toolCalls && message.toolCalls.length > 0) {
        param.tool_calls = message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments },
        }));
      }
      return param;
    }
  }
}

// ============================================
// PROMPTS
// ============================================

export const SYSTEM_PROMPT =
  'You are a travel assistant. Recommend flights using only the data you are given ' +
  'or that the flight_search tool returns. Be concise: name the airline, times, ' +
  'price and stops, and say in one or two sentences why the flight is a good pick.';

function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Fixed description of the selected flight sent to the model
 */
export function renderFlightSummary(flight: ParsedFlight): string {
  const { record } = flight;
  const departure = flight.departureMinutes === null
    ? record.departureTime
    : formatMinutes(flight.departureMinutes);

  return [
    'Recommended flight:',
    `- Airline: ${record.airline}`,
    `- Departure: ${departure}`,
    `- Arrival: ${record.arrivalTime}`,
    `- Duration: ${record.duration}`,
    `- Price: ${record.price}`,
    `- Stops: ${record.stops || 'Nonstop'}`,
  ].join('\n');
}

// ============================================
// OUTPUT CLEANUP
// ============================================

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  euro: '€',
  pound: '£',
};

/**
 * Decode named and numeric HTML entities. Unknown names are left as written.
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#')) {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * Models sometimes answer with HTML entities and with escaped control
 * characters written out literally ("\\n"). Both are turned back into text.
 */
export function normalizeModelOutput(text: string): string {
  return decodeHtmlEntities(text).replace(/\\[nrt]/g, '\n').trim();
}

// ============================================
// AGENT
// ============================================

export type RecommendationInput =
  | { kind: 'flight'; flight: ParsedFlight }
  | { kind: 'query'; text: string };

const toolArgumentsSchema = z.object({
  query: z.string().optional(),
  maxPrice: z.number().nonnegative().optional(),
  timeBucket: z.enum(['morning', 'afternoon', 'evening', 'any']).optional(),
  stopover: z.enum(['any', 'none', 'required']).optional(),
});

export const FLIGHT_SEARCH_PARAMETERS: Record<string, unknown> = {
  type: 'object',
  properties: {
    query: {
      type: 'string',
      description: 'The user request in their own words, e.g. "direct flight in the morning under 200 euros"',
    },
    maxPrice: { type: 'number', description: 'Highest acceptable price' },
    timeBucket: { type: 'string', enum: [...TIME_BUCKETS] },
    stopover: { type: 'string', enum: [...STOPOVER_PREFERENCES] },
  },
};

/**
 * Criteria for a tool call. Fields the model set explicitly win over what
 * the keyword parser reads from its query text (or from the user's question
 * when the arguments are missing or malformed).
 */
export function criteriaFromToolArguments(rawArguments: string, question: string): FilterCriteria {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArguments || '{}');
  } catch {
    logger.recommender.warn('Tool arguments are not JSON, reading the question instead');
    return parseFilterQuery(question);
  }

  const result = toolArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    logger.recommender.warn('Tool arguments failed validation, reading the question instead', {
      issues: result.error.issues.length,
    });
    return parseFilterQuery(question);
  }

  const args = result.data;
  const criteria = parseFilterQuery(args.query ?? question);
  if (args.maxPrice !== undefined) criteria.maxPrice = args.maxPrice;
  if (args.timeBucket !== undefined) criteria.timeBucket = args.timeBucket;
  if (args.stopover !== undefined) criteria.stopover = args.stopover;
  return criteria;
}

export interface RecommenderAgentOptions {
  systemPrompt: string;
  /** Model turns that may call tools before an answer is required */
  maxToolRounds: number;
}

const DEFAULT_OPTIONS: RecommenderAgentOptions = {
  systemPrompt: SYSTEM_PROMPT,
  maxToolRounds: 3,
};

export class RecommenderAgent {
  private options: RecommenderAgentOptions;

  constructor(
    private readonly model: LanguageModel,
    private readonly search?: FlightSearchCapability,
    options: Partial<RecommenderAgentOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * @throws RecommendationError when the model fails or answers with nothing
   */
  async summarize(input: RecommendationInput): Promise<string> {
    const startTime = Date.now();
    const userContent = input.kind === 'flight' ? renderFlightSummary(input.flight) : input.text;
    const messages: ChatMessage[] = [
      { role: 'system', content: this.options.systemPrompt },
      { role: 'user', content: userContent },
    ];

    const tools = input.kind === 'query' && this.search ? [this.toolDefinition(this.search)] : [];
    const question = input.kind === 'query' ? input.text : '';

    let content: string | null = null;
    for (let round = 0; ; round++) {
      const allowTools = tools.length > 0 && round < this.options.maxToolRounds;
      const completion = await this.complete(messages, allowTools ? tools : []);
      content = completion.content;

      if (!allowTools || completion.toolCalls.length === 0) {
        break;
      }

      messages.push({ role: 'assistant', content: completion.content, toolCalls: completion.toolCalls });
      for (const call of completion.toolCalls) {
        messages.push({ role: 'tool', toolCallId: call.id, content: await this.runTool(call, question) });
      }
    }

    const output = normalizeModelOutput(content ?? '');
    if (output === '') {
      throw new RecommendationError('the model returned an empty answer');
    }

    logger.recommender.timed('Recommendation produced', startTime, { kind: input.kind, chars: output.length });
    return output;
  }

  private toolDefinition(search: FlightSearchCapability): ToolDefinition {
    return {
      name: search.name,
      description: search.description,
      parameters: FLIGHT_SEARCH_PARAMETERS,
    };
  }

  private async complete(messages: readonly ChatMessage[], tools: readonly ToolDefinition[]): Promise<ChatCompletion> {
    try {
      return await this.model.complete(messages, tools);
    } catch (error) {
      logger.recommender.error('Model call failed', { error });
      if (error instanceof RecommendationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new RecommendationError(reason, { cause: error });
    }
  }

  private async runTool(call: ChatToolCall, question: string): Promise<string> {
    if (!this.search || call.name !== this.search.name) {
      logger.recommender.warn('Model called an unknown tool', { tool: call.name });
      return `Unknown tool: ${call.name}. Available tools: ${FLIGHT_SEARCH_TOOL_NAME}`;
    }
    const criteria = criteriaFromToolArguments(call.arguments, question);
    logger.recommender.info('Running flight search for the model', { criteria });
    return this.search.run(criteria);
  }
}
