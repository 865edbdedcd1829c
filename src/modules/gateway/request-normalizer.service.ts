import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Joi from 'joi';
import {
  ChatMessage,
  ChatRequestDefaults,
  NormalizedChatRequest,
} from './interfaces/gateway.interfaces';
import { ValidationError } from './errors/gateway.errors';
import { isPlainObject } from '../../common/utils/is-plain-object';

export const MESSAGES_REQUIRED = 'Messages field is required';

const BEARER_PREFIX = 'Bearer ';

interface ChatRequestBody {
  model?: string | null;
  messages: ChatMessage[];
  temperature?: number | null;
  max_tokens?: number | null;
}

const chatRequestSchema = Joi.object<ChatRequestBody>({
  model: Joi.string().allow(null),
  messages: Joi.array()
    .items(
      Joi.object({
        role: Joi.string().required(),
        content: Joi.alternatives()
          .try(Joi.string().allow(''), Joi.array())
          .allow(null),
      }).unknown(true),
    )
    .min(1)
    .required(),
  temperature: Joi.number().allow(null),
  max_tokens: Joi.number().integer().min(1).allow(null),
}).unknown(true);

@Injectable()
export class RequestNormalizerService {
  private readonly logger = new Logger(RequestNormalizerService.name);
  private readonly defaults: ChatRequestDefaults;

  constructor(private readonly config: ConfigService) {
    this.defaults = {
      model: this.config.get<string>('DEFAULT_MODEL', 'claude-3-5-haiku-20241022'),
      temperature: this.config.get<number>('DEFAULT_TEMPERATURE', 0.7),
      maxTokens: this.config.get<number>('DEFAULT_MAX_TOKENS', 20),
    };
  }

  /**
   * Build the canonical request from raw body bytes and request headers.
   * Throws ValidationError when the body does not describe a chat request.
   */
  normalize(
    body: Buffer,
    headers: Record<string, string>,
  ): NormalizedChatRequest {
    const data = this.parseBody(body);

    if (!isPresent(data.messages)) {
      throw new ValidationError(MESSAGES_REQUIRED);
    }

    const { error, value } = chatRequestSchema.validate(data, {
      abortEarly: true,
      convert: true,
    });
    if (error || !value) {
      throw new ValidationError(error?.message ?? MESSAGES_REQUIRED);
    }

    return {
      model: value.model ?? this.defaults.model,
      messages: value.messages,
      temperature: value.temperature ?? this.defaults.temperature,
      max_tokens: value.max_tokens ?? this.defaults.maxTokens,
      credential: extractCredential(headers),
    };
  }

  /**
   * Lenient parse: an empty body, invalid JSON, or a non-object document all
   * read as an empty mapping.
   */
  parseBody(body: Buffer): Record<string, unknown> {
    if (body.length === 0) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString('utf-8'));
    } catch (error) {
      this.logger.debug(
        `Request body is not valid JSON, reading it as empty: ${error instanceof Error ? error.message : String(error)}`,
      );
      return {};
    }

    return isPlainObject(parsed) ? parsed : {};
  }
}

/**
 * Authorization header value without a leading "Bearer ", or '' when absent
 */
export function extractCredential(headers: Record<string, string>): string {
  const value = getHeader(headers, 'authorization');
  if (value === undefined) {
    return '';
  }
  return value.startsWith(BEARER_PREFIX)
    ? value.slice(BEARER_PREFIX.length)
    : value;
}

export function getHeader(
  headers: Record<string, string>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Truthiness as a JSON document sees it: empty strings, zero, false, null,
 * empty arrays and empty objects are all absent.
 */
function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}
