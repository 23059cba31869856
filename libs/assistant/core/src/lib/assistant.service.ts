import { Inject, Injectable, Logger } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { AssistantResponse, ResponseOrigin } from '@kb-chat/shared/types';
import { QueryClassifierService } from './classifier';
import { ResponseDispatcherService } from './dispatcher';
import { AssistantMessages } from './assistant-messages';

/**
 * Entry point for the chat surface: classify, then dispatch.
 */
@Injectable()
export class AssistantService {
  private readonly logger = new Logger(AssistantService.name);

  constructor(
    private readonly classifier: QueryClassifierService,
    private readonly dispatcher: ResponseDispatcherService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  async answer(query: string): Promise<AssistantResponse> {
    const startedAt = Date.now();
    try {
      const classified = await this.classifier.classify(query);
      const response = await this.dispatcher.dispatch(classified);

      this.logger.log(
        `Answered ${classified.category} query from ${response.origin} in ${Date.now() - startedAt}ms`
      );
      return response;
    } catch (error) {
      // Classifier and dispatcher recover on their own; this is the last line
      this.logger.error('Unexpected failure while answering query:', error);
      return {
        text: AssistantMessages.SERVICE_UNAVAILABLE(this.config.productName),
        origin: ResponseOrigin.ERROR,
        citations: [],
      };
    }
  }
}
