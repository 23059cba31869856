import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClassifiedQuery, QueryCategory } from '@kb-chat/shared/types';
import {
  CLASSIFICATION_POLICY,
  ClassificationPolicy,
} from './classification-policy.interface';

@Injectable()
export class QueryClassifierService {
  private readonly logger = new Logger(QueryClassifierService.name);

  constructor(
    @Inject(CLASSIFICATION_POLICY)
    private readonly policy: ClassificationPolicy
  ) {}

  /**
   * Classify a user query. Never rejects: blank input and any policy
   * failure both come back as GENERIC.
   */
  async classify(text: string): Promise<ClassifiedQuery> {
    if (text.trim() === '') {
      return { text, category: QueryCategory.GENERIC };
    }

    try {
      const category = await this.policy.classify(text);
      this.logger.log(`Query classified as ${category} (${this.policy.type})`);
      return { text, category };
    } catch (error) {
      this.logger.warn(
        `Classification failed, treating query as generic: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return { text, category: QueryCategory.GENERIC };
    }
  }
}
