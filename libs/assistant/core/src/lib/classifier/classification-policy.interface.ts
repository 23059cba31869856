import { ClassifierPolicyType, QueryCategory } from '@kb-chat/shared/types';

/**
 * Injection token for the active ClassificationPolicy
 */
export const CLASSIFICATION_POLICY = 'CLASSIFICATION_POLICY';

export interface ClassificationPolicy {
  readonly type: ClassifierPolicyType;

  /**
   * Decide the category of a non-blank query. May throw; the classifier
   * service owns the fallback.
   */
  classify(text: string): Promise<QueryCategory>;
}
