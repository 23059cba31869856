import { Provider } from '@nestjs/common';
import { BedrockAgentRuntimeClient } from '@aws-sdk/client-bedrock-agent-runtime';
import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';

/**
 * AWS SDK clients, built once from the assistant configuration.
 * Credentials are passed explicitly so the default provider chain is not consulted.
 */
export const bedrockClientProviders: Provider[] = [
  {
    provide: BedrockAgentRuntimeClient,
    useFactory: (config: AssistantConfig) =>
      new BedrockAgentRuntimeClient({
        region: config.region,
        credentials: {
          accessKeyId: config.credentials.accessKeyId,
          secretAccessKey: config.credentials.secretAccessKey,
        },
      }),
    inject: [assistantConfig.KEY],
  },
  {
    provide: BedrockRuntimeClient,
    useFactory: (config: AssistantConfig) =>
      new BedrockRuntimeClient({
        region: config.region,
        credentials: {
          accessKeyId: config.credentials.accessKeyId,
          secretAccessKey: config.credentials.secretAccessKey,
        },
      }),
    inject: [assistantConfig.KEY],
  },
];
