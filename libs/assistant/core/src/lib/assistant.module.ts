import { Module } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { ClassifierPolicyType } from '@kb-chat/shared/types';
import {
  bedrockClientProviders,
  FoundationModelGateway,
  KnowledgeBaseGateway,
  RequestDeadlineService,
} from './bedrock';
import {
  CLASSIFICATION_POLICY,
  ClassificationPolicy,
  KeywordClassificationPolicy,
  ModelClassificationPolicy,
  QueryClassifierService,
} from './classifier';
import { ResponseDispatcherService } from './dispatcher';
import { AssistantService } from './assistant.service';

/**
 * Assistant Module
 *
 * Requires the `assistant` configuration namespace to be loaded globally
 * (ConfigModule.forRoot({ isGlobal: true, load: [assistantConfig] })).
 */
@Module({
  providers: [
    ...bedrockClientProviders,
    RequestDeadlineService,
    KnowledgeBaseGateway,
    FoundationModelGateway,
    KeywordClassificationPolicy,
    ModelClassificationPolicy,
    {
      provide: CLASSIFICATION_POLICY,
      useFactory: (
        config: AssistantConfig,
        keyword: KeywordClassificationPolicy,
        model: ModelClassificationPolicy
      ): ClassificationPolicy =>
        config.classifierPolicy === ClassifierPolicyType.MODEL
          ? model
          : keyword,
      inject: [
        assistantConfig.KEY,
        KeywordClassificationPolicy,
        ModelClassificationPolicy,
      ],
    },
    QueryClassifierService,
    ResponseDispatcherService,
    AssistantService,
  ],
  exports: [AssistantService],
})
export class AssistantModule {}
