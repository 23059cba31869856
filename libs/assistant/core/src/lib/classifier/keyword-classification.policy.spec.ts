/**
 * KeywordClassificationPolicy Tests
 */

import { QueryCategory } from '@kb-chat/shared/types';
import { createTestConfig } from '../../test-utils/test-config';
import {
  KeywordClassificationPolicy,
  tokenize,
} from './keyword-classification.policy';

describe('KeywordClassificationPolicy', () => {
  const policy = new KeywordClassificationPolicy(createTestConfig());

  describe('tokenize', () => {
    it('should lower-case and split on punctuation', () => {
      expect(tokenize("What's the Return-Policy?")).toEqual([
        'what',
        's',
        'the',
        'return',
        'policy',
      ]);
    });
  });

  it.each([
    'What is the return policy?',
    'How do I get a refund',
    'Is shipping free?',
    'Returns accepted?',
    'Tell me about Acme',
    'do WIDGETS come in blue',
    'How much is one widget',
  ])('should classify "%s" as in-domain', async (query) => {
    await expect(policy.classify(query)).resolves.toBe(QueryCategory.IN_DOMAIN);
  });

  it.each([
    "What's the capital of France?",
    'Tell me a joke',
    'hello there',
  ])('should classify "%s" as generic', async (query) => {
    await expect(policy.classify(query)).resolves.toBe(QueryCategory.GENERIC);
  });

  it('should match configured product keywords, including phrases', async () => {
    const custom = new KeywordClassificationPolicy(
      createTestConfig({ productKeywords: ['gizmo', 'turbo mode'] })
    );

    await expect(custom.classify('Where is my gizmo?')).resolves.toBe(
      QueryCategory.IN_DOMAIN
    );
    await expect(custom.classify('How do I enable Turbo Mode')).resolves.toBe(
      QueryCategory.IN_DOMAIN
    );
    await expect(custom.classify('turbo charged cars')).resolves.toBe(
      QueryCategory.GENERIC
    );
  });

  it('should ignore product name tokens shorter than three characters', async () => {
    const shortName = new KeywordClassificationPolicy(
      createTestConfig({ productName: 'X1 Go' })
    );

    await expect(shortName.classify('let us go outside')).resolves.toBe(
      QueryCategory.GENERIC
    );
    await expect(shortName.classify('Is the x1 go waterproof')).resolves.toBe(
      QueryCategory.IN_DOMAIN
    );
  });

  it('should be deterministic for identical input', async () => {
    const first = await policy.classify('Can I upgrade my plan?');
    const second = await policy.classify('Can I upgrade my plan?');

    expect(first).toBe(second);
  });
});
