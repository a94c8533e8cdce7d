/**
 * OpenAI message classifier
 * Sends one message to the Chat Completions API and validates the JSON verdict
 */

import { z } from 'zod';
import type {
  IMessageClassifier,
  MailMessage,
  MessageAnalysis,
  OpenAIClassifierConfig,
} from '../../types/index.js';
import { CLASSIFIER_SYSTEM_PROMPT, buildClassificationPrompt } from '../../prompts/classification.js';
import { RawMessageAnalysisSchema, toMessageAnalysis } from '../../schemas/analysis.js';
import { AssistantError, ErrorCodes } from '../../utils/error.js';
import { defaultLogger } from '../base.js';
import type { ProviderLogger } from '../base.js';

/**
 * Chat Completions response, reduced to the fields we read
 */
const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .optional(),
  error: z.object({ message: z.string().optional() }).optional(),
});

type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

async function readResponseBody(response: Response): Promise<ChatCompletionResponse> {
  const payload: unknown = await response.json().catch(() => null);
  const parsed = ChatCompletionResponseSchema.safeParse(payload);
  return parsed.success ? parsed.data : {};
}

function classifierError(
  message: string,
  options?: { retryable?: boolean; retryAfter?: number; details?: Record<string, unknown>; cause?: Error }
): AssistantError {
  return new AssistantError(message, ErrorCodes.CLASSIFIER_ERROR, { provider: 'openai', ...options });
}

/**
 * Strip a surrounding markdown code fence (```json ... ```) if present
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;
}

/**
 * Parse and validate the model's reply text
 */
export function parseClassifierReply(text: string): MessageAnalysis {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw classifierError('Classifier returned invalid JSON', {
      details: { reply: text.slice(0, 200) },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = RawMessageAnalysisSchema.safeParse(json);
  if (!parsed.success) {
    throw classifierError('Classifier reply does not match the expected shape', {
      details: { issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
    });
  }
  return toMessageAnalysis(parsed.data);
}

export class OpenAIClassifier implements IMessageClassifier {
  private readonly config: OpenAIClassifierConfig;
  private readonly logger: ProviderLogger;

  constructor(config: OpenAIClassifierConfig, logger?: ProviderLogger) {
    this.config = config;
    this.logger = logger ?? defaultLogger;
  }

  async classify(message: MailMessage): Promise<MessageAnalysis> {
    if (!this.config.apiKey) {
      throw new AssistantError('No OpenAI API key configured. Set OPENAI_API_KEY.', ErrorCodes.AUTH_MISSING, {
        provider: 'openai',
      });
    }

    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const body = {
      model: this.config.model,
      temperature: this.config.temperature,
      messages: [
        { role: 'system', content: CLASSIFIER_SYSTEM_PROMPT },
        { role: 'user', content: buildClassificationPrompt(message, this.config.maxBodyChars) },
      ],
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new AssistantError('OpenAI request failed', ErrorCodes.NETWORK_ERROR, {
        provider: 'openai',
        retryable: true,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const data = await readResponseBody(response);

    if (!response.ok) {
      const errorMessage = data.error?.message ?? `HTTP ${response.status}`;
      if (response.status === 429) {
        throw new AssistantError(`OpenAI rate limit: ${errorMessage}`, ErrorCodes.RATE_LIMITED, {
          provider: 'openai',
          retryable: true,
          retryAfter: 60,
        });
      }
      if (response.status === 401) {
        throw new AssistantError(`OpenAI authentication failed: ${errorMessage}`, ErrorCodes.AUTH_FAILED, {
          provider: 'openai',
        });
      }
      throw classifierError(`OpenAI API error: ${errorMessage}`, {
        retryable: response.status >= 500,
        details: { status: response.status, model: this.config.model },
      });
    }

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw classifierError('OpenAI response has no message content', {
        details: { model: this.config.model },
      });
    }

    const analysis = parseClassifierReply(content);
    this.logger.debug(
      `Classified "${message.subject}": ${analysis.messageType}, needsResponse=${analysis.needsResponse}`
    );
    return analysis;
  }
}
