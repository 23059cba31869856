/**
 * QueryClassifierService Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ClassifierPolicyType, QueryCategory } from '@kb-chat/shared/types';
import { QueryClassifierService } from './query-classifier.service';
import { CLASSIFICATION_POLICY } from './classification-policy.interface';
import { ClassificationError } from '../errors';

describe('QueryClassifierService', () => {
  let service: QueryClassifierService;
  let policy: { type: ClassifierPolicyType; classify: jest.Mock };

  beforeEach(async () => {
    policy = {
      type: ClassifierPolicyType.KEYWORD,
      classify: jest.fn().mockResolvedValue(QueryCategory.IN_DOMAIN),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QueryClassifierService,
        { provide: CLASSIFICATION_POLICY, useValue: policy },
      ],
    }).compile();

    service = module.get<QueryClassifierService>(QueryClassifierService);
  });

  it.each(['', '   ', '\n\t'])(
    'should classify blank input %j as generic without consulting the policy',
    async (text) => {
      const result = await service.classify(text);

      expect(result).toEqual({ text, category: QueryCategory.GENERIC });
      expect(policy.classify).not.toHaveBeenCalled();
    }
  );

  it('should return the policy verdict for non-blank input', async () => {
    const result = await service.classify('What is the return policy?');

    expect(result).toEqual({
      text: 'What is the return policy?',
      category: QueryCategory.IN_DOMAIN,
    });
    expect(policy.classify).toHaveBeenCalledWith('What is the return policy?');
  });

  it('should degrade to generic when the policy throws', async () => {
    policy.classify.mockRejectedValue(
      new ClassificationError('Unrecognised model verdict')
    );

    await expect(service.classify('Anything')).resolves.toEqual({
      text: 'Anything',
      category: QueryCategory.GENERIC,
    });
  });

  it('should degrade to generic on non-Error rejections', async () => {
    policy.classify.mockRejectedValue('boom');

    const result = await service.classify('Anything');

    expect(result.category).toBe(QueryCategory.GENERIC);
  });
});
