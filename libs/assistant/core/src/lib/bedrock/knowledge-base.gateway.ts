import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BedrockAgentRuntimeClient,
  Citation,
  RetrieveAndGenerateCommand,
  RetrieveAndGenerateType,
} from '@aws-sdk/client-bedrock-agent-runtime';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { SourceCitation } from '@kb-chat/shared/types';
import { ExternalServiceError } from '../errors';
import { RequestDeadlineService } from './request-deadline.service';

export interface KnowledgeBaseAnswer {
  text: string;
  citations: SourceCitation[];
}

const OPERATION = 'RetrieveAndGenerate';

/**
 * Build the foundation-model ARN the knowledge base generates with.
 * A model id that is already an ARN (e.g. an inference profile) is kept as is.
 */
export function buildModelArn(region: string, modelId: string): string {
  if (modelId.startsWith('arn:')) {
    return modelId;
  }
  return `arn:aws:bedrock:${region}::foundation-model/${modelId}`;
}

@Injectable()
export class KnowledgeBaseGateway {
  private readonly logger = new Logger(KnowledgeBaseGateway.name);

  constructor(
    private readonly client: BedrockAgentRuntimeClient,
    private readonly deadline: RequestDeadlineService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {}

  /**
   * One RetrieveAndGenerate round trip against the configured knowledge base.
   * The answer text comes back exactly as the service produced it.
   */
  async retrieveAndGenerate(query: string): Promise<KnowledgeBaseAnswer> {
    const command = new RetrieveAndGenerateCommand({
      input: { text: query },
      retrieveAndGenerateConfiguration: {
        type: RetrieveAndGenerateType.KNOWLEDGE_BASE,
        knowledgeBaseConfiguration: {
          knowledgeBaseId: this.config.knowledgeBaseId,
          modelArn: buildModelArn(this.config.region, this.config.modelId),
        },
      },
    });

    const response = await this.deadline.run(OPERATION, (abortSignal) =>
      this.client.send(command, { abortSignal })
    );

    const text = response.output?.text;
    if (typeof text !== 'string' || text.trim() === '') {
      throw ExternalServiceError.malformed(
        OPERATION,
        'response carries no output text'
      );
    }

    const citations = this.extractCitations(response.citations ?? []);
    if (citations.length === 0) {
      this.logger.warn('No specific context found in knowledge base response');
    } else {
      this.logger.debug(
        `Answer backed by ${citations.length} reference(s), first: ${citations[0].uri ?? 'unknown source'}`
      );
    }

    return { text, citations };
  }

  private extractCitations(citations: Citation[]): SourceCitation[] {
    const sources: SourceCitation[] = [];

    for (const citation of citations) {
      for (const reference of citation.retrievedReferences ?? []) {
        const uri =
          reference.location?.s3Location?.uri ??
          reference.location?.webLocation?.url;
        const excerpt = reference.content?.text;
        if (uri || excerpt) {
          sources.push({ excerpt, uri });
        }
      }
    }

    return sources;
  }
}
