/**
 * Test helpers for modules that inject the assistant configuration
 */

import { DynamicModule, Module } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import {
  ClassifierPolicyType,
  GenericResponseMode,
} from '@kb-chat/shared/types';

export function createTestConfig(
  overrides: Partial<AssistantConfig> = {}
): AssistantConfig {
  return {
    region: 'us-east-1',
    credentials: {
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    },
    modelId: 'amazon.nova-pro-v1:0',
    knowledgeBaseId: 'KB12345',
    productName: 'Acme Widgets',
    appTitle: 'Acme Assistant',
    productKeywords: [],
    classifierPolicy: ClassifierPolicyType.KEYWORD,
    genericResponseMode: GenericResponseMode.FALLBACK,
    requestTimeoutMs: 1000,
    ...overrides,
  };
}

export const configProvider = (config: AssistantConfig) => ({
  provide: assistantConfig.KEY,
  useValue: config,
});

/**
 * Stands in for ConfigModule.forRoot({ isGlobal: true, load: [assistantConfig] })
 */
@Module({})
export class TestAssistantConfigModule {
  static register(config: AssistantConfig): DynamicModule {
    return {
      module: TestAssistantConfigModule,
      global: true,
      providers: [configProvider(config)],
      exports: [assistantConfig.KEY],
    };
  }
}
