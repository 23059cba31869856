import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { ExternalServiceError } from '../errors';
import { RequestDeadlineService } from './request-deadline.service';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

const OPERATION = 'InvokeModel';

// Amazon Nova "messages-v1" response body
const completionBodySchema = z.object({
  output: z.object({
    message: z.object({
      content: z.array(z.object({ text: z.string().optional() })),
    }),
  }),
});

/**
 * Single-turn text completion against the configured foundation model.
 * Used by the model classification policy and the model-backed generic reply.
 */
@Injectable()
export class FoundationModelGateway {
  private readonly logger = new Logger(FoundationModelGateway.name);

  constructor(
    private readonly client: BedrockRuntimeClient,
    private readonly deadline: RequestDeadlineService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const body = JSON.stringify({
      schemaVersion: 'messages-v1',
      messages: [{ role: 'user', content: [{ text: request.prompt }] }],
      system: [{ text: request.system }],
      inferenceConfig: {
        max_new_tokens: request.maxTokens,
        top_p: 0.9,
        top_k: 20,
        temperature: request.temperature,
      },
    });

    const command = new InvokeModelCommand({
      modelId: this.config.modelId,
      body,
      accept: 'application/json',
      contentType: 'application/json',
    });

    const response = await this.deadline.run(OPERATION, (abortSignal) =>
      this.client.send(command, { abortSignal })
    );

    let payload: unknown;
    try {
      payload = JSON.parse(response.body.transformToString());
    } catch (error) {
      throw ExternalServiceError.malformed(
        OPERATION,
        `response body is not JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = completionBodySchema.safeParse(payload);
    if (!parsed.success) {
      throw ExternalServiceError.malformed(
        OPERATION,
        `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }

    const text = parsed.data.output.message.content
      .map((block) => block.text ?? '')
      .join('');
    this.logger.debug(`Model returned ${text.length} chars`);

    return text;
  }
}
