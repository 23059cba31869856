import { Inject, Injectable, Logger } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import {
  AssistantResponse,
  ClassifiedQuery,
  GenericResponseMode,
  QueryCategory,
  ResponseOrigin,
} from '@kb-chat/shared/types';
import { FoundationModelGateway, KnowledgeBaseGateway } from '../bedrock';
import { ExternalServiceError } from '../errors';
import { AssistantMessages } from '../assistant-messages';
import {
  GENERIC_ASSISTANT_SYSTEM_PROMPT,
  GENERIC_MAX_TOKENS,
} from '../prompts';

/**
 * Turns a classified query into the text shown to the user.
 *
 * In-domain queries make exactly one knowledge-base call. Generic queries get
 * the fixed fallback unless model replies are enabled. External failures are
 * logged and replaced by a readable error message; nothing is rethrown.
 */
@Injectable()
export class ResponseDispatcherService {
  private readonly logger = new Logger(ResponseDispatcherService.name);

  constructor(
    private readonly knowledgeBase: KnowledgeBaseGateway,
    private readonly model: FoundationModelGateway,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  async dispatch(query: ClassifiedQuery): Promise<AssistantResponse> {
    if (query.category === QueryCategory.IN_DOMAIN) {
      return this.answerFromKnowledgeBase(query.text);
    }
    return this.answerGeneric(query.text);
  }

  private async answerFromKnowledgeBase(
    text: string
  ): Promise<AssistantResponse> {
    this.logger.log('Querying knowledge base');
    try {
      const answer = await this.knowledgeBase.retrieveAndGenerate(text);
      return {
        text: answer.text,
        origin: ResponseOrigin.KNOWLEDGE_BASE,
        citations: answer.citations,
      };
    } catch (error) {
      return this.failure(error, 'RetrieveAndGenerate');
    }
  }

  private async answerGeneric(text: string): Promise<AssistantResponse> {
    if (
      this.config.genericResponseMode === GenericResponseMode.MODEL &&
      text.trim() !== ''
    ) {
      this.logger.log('Answering generic query with the foundation model');
      try {
        const reply = await this.model.complete({
          system: GENERIC_ASSISTANT_SYSTEM_PROMPT,
          prompt: text,
          maxTokens: GENERIC_MAX_TOKENS,
          temperature: 0.7,
        });
        if (reply.trim() === '') {
          throw ExternalServiceError.malformed('InvokeModel', 'empty reply');
        }
        return { text: reply, origin: ResponseOrigin.MODEL, citations: [] };
      } catch (error) {
        return this.failure(error, 'InvokeModel');
      }
    }

    return {
      text: AssistantMessages.FALLBACK(this.config.productName),
      origin: ResponseOrigin.FALLBACK,
      citations: [],
    };
  }

  private failure(error: unknown, operation: string): AssistantResponse {
    const serviceError = ExternalServiceError.fromUnknown(operation, error);
    this.logger.error(serviceError.message, serviceError.stack);

    return {
      text: AssistantMessages.SERVICE_UNAVAILABLE(this.config.productName),
      origin: ResponseOrigin.ERROR,
      citations: [],
    };
  }
}
