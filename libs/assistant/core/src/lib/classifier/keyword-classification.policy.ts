import { Inject, Injectable } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '@kb-chat/assistant/config';
import { ClassifierPolicyType, QueryCategory } from '@kb-chat/shared/types';
import { ClassificationPolicy } from './classification-policy.interface';
import defaultKeywords from './default-keywords.json';

const MIN_PRODUCT_TOKEN_LENGTH = 3;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

// Plural-insensitive comparison: "returns" matches "return"
function stem(word: string): string {
  return word.length > 3 && word.endsWith('s') ? word.slice(0, -1) : word;
}

/**
 * Default policy: a query is in-domain when it names the product or uses
 * product or support vocabulary.
 */
@Injectable()
export class KeywordClassificationPolicy implements ClassificationPolicy {
  readonly type = ClassifierPolicyType.KEYWORD;

  private readonly stems: ReadonlySet<string>;
  private readonly phrases: readonly string[];

  constructor(
    @Inject(assistantConfig.KEY) config: AssistantConfig
  ) {
    const productTokens = tokenize(config.productName);
    const keywords = [
      ...defaultKeywords,
      ...config.productKeywords,
      ...productTokens.filter(
        (token) => token.length >= MIN_PRODUCT_TOKEN_LENGTH
      ),
    ];

    const stems = new Set<string>();
    const phrases: string[] = [productTokens.join(' ')];
    for (const keyword of keywords) {
      const tokens = tokenize(keyword);
      if (tokens.length === 1) {
        stems.add(stem(tokens[0]));
      } else if (tokens.length > 1) {
        phrases.push(tokens.join(' '));
      }
    }

    this.stems = stems;
    this.phrases = phrases.filter((phrase) => phrase.length > 0);
  }

  async classify(text: string): Promise<QueryCategory> {
    return this.matches(text) ? QueryCategory.IN_DOMAIN : QueryCategory.GENERIC;
  }

  private matches(text: string): boolean {
    const tokens = tokenize(text);
    if (tokens.some((token) => this.stems.has(stem(token)))) {
      return true;
    }

    const normalized = ` ${tokens.join(' ')} `;
    return this.phrases.some((phrase) => normalized.includes(` ${phrase} `));
  }
}
