import { Inject, Injectable, Logger } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { ClassifierPolicyType, QueryCategory } from '@kb-chat/shared/types';
import { FoundationModelGateway } from '../bedrock';
import { ClassificationError } from '../errors';
import { CLASSIFIER_MAX_TOKENS, classifierSystemPrompt } from '../prompts';
import { ClassificationPolicy } from './classification-policy.interface';

/**
 * Asks the foundation model whether the query is about the product.
 * Runs at temperature 0 so identical input gets the same verdict.
 */
@Injectable()
export class ModelClassificationPolicy implements ClassificationPolicy {
  readonly type = ClassifierPolicyType.MODEL;
  private readonly logger = new Logger(ModelClassificationPolicy.name);

  constructor(
    private readonly model: FoundationModelGateway,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  async classify(text: string): Promise<QueryCategory> {
    let verdict: string;
    try {
      verdict = await this.model.complete({
        system: classifierSystemPrompt(this.config.productName),
        prompt: text,
        maxTokens: CLASSIFIER_MAX_TOKENS,
        temperature: 0,
      });
    } catch (error) {
      throw new ClassificationError('Model classification call failed', {
        cause: error,
      });
    }

    this.logger.debug(`Model verdict: ${verdict.trim()}`);

    if (/\bproduct\b/i.test(verdict)) {
      return QueryCategory.IN_DOMAIN;
    }
    if (/\bgeneric\b/i.test(verdict)) {
      return QueryCategory.GENERIC;
    }
    throw new ClassificationError(`Unrecognised model verdict: "${verdict}"`);
  }
}
