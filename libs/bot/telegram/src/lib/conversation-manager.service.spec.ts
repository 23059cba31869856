/**
 * ConversationManagerService Tests
 * Runs turns against the real session store with a stubbed assistant
 */

import { Test } from '@nestjs/testing';
import { AssistantMessages, AssistantService } from '@kb-chat/assistant/core';
import {
  InMemorySessionRepository,
  SESSION_REPOSITORY,
  SessionOrchestrator,
} from '@kb-chat/bot/sessions';
import {
  AssistantResponse,
  ResponseOrigin,
  TurnRole,
} from '@kb-chat/shared/types';
import { ConversationManagerService } from './conversation-manager.service';
import { TelegramFormatterService } from './formatters/telegram-formatter.service';
import { asContext, createMockContext, repliesOf } from '../test-utils/mock-telegram';

describe('ConversationManagerService', () => {
  let manager: ConversationManagerService;
  let orchestrator: SessionOrchestrator;
  let answer: jest.Mock<Promise<AssistantResponse>, [string]>;

  const knowledgeBaseAnswer: AssistantResponse = {
    text: 'Returns accepted within 30 days.',
    origin: ResponseOrigin.KNOWLEDGE_BASE,
    citations: [{ uri: 's3://acme-docs/returns.md', excerpt: 'Returns are accepted within 30 days of delivery.' }],
  };

  const fallbackAnswer: AssistantResponse = {
    text: AssistantMessages.FALLBACK('Acme Widgets'),
    origin: ResponseOrigin.FALLBACK,
    citations: [],
  };

  beforeEach(async () => {
    answer = jest.fn<Promise<AssistantResponse>, [string]>();

    const module = await Test.createTestingModule({
      providers: [
        ConversationManagerService,
        TelegramFormatterService,
        SessionOrchestrator,
        { provide: SESSION_REPOSITORY, useClass: InMemorySessionRepository },
        { provide: AssistantService, useValue: { answer } },
      ],
    }).compile();

    manager = module.get(ConversationManagerService);
    orchestrator = module.get(SessionOrchestrator);
  });

  it('should answer a product question from the knowledge base', async () => {
    answer.mockResolvedValue(knowledgeBaseAnswer);
    const mock = createMockContext('What is the return policy?');

    await manager.executeConversation('123', 'What is the return policy?', asContext(mock));

    expect(answer).toHaveBeenCalledWith('What is the return policy?');
    expect(repliesOf(mock)).toEqual(['Returns accepted within 30 days.']);

    const history = orchestrator.getConversationHistory('123');
    expect(history.map(({ role, text }) => ({ role, text }))).toEqual([
      { role: TurnRole.USER, text: 'What is the return policy?' },
      { role: TurnRole.ASSISTANT, text: 'Returns accepted within 30 days.' },
    ]);
    expect(orchestrator.getLastCitations('123')).toEqual(knowledgeBaseAnswer.citations);
    expect(mock.sendChatAction).toHaveBeenCalledWith('typing');
  });

  it('should add only the fallback turn for an empty message', async () => {
    answer.mockResolvedValue(fallbackAnswer);
    const mock = createMockContext('');

    await manager.executeConversation('123', '', asContext(mock));

    const history = orchestrator.getConversationHistory('123');
    expect(history).toHaveLength(1);
    expect(history[0].role).toBe(TurnRole.ASSISTANT);
    expect(history[0].text).toContain('Acme Widgets');
    expect(repliesOf(mock)).toEqual([fallbackAnswer.text]);
  });

  it('should keep the transcript across turns', async () => {
    answer
      .mockResolvedValueOnce(knowledgeBaseAnswer)
      .mockResolvedValueOnce(fallbackAnswer);

    await manager.executeConversation('123', 'What is the return policy?', asContext(createMockContext('a')));
    await manager.executeConversation('123', 'Tell me a joke', asContext(createMockContext('b')));

    expect(orchestrator.getConversationHistory('123').map((turn) => turn.text)).toEqual([
      'What is the return policy?',
      'Returns accepted within 30 days.',
      'Tell me a joke',
      fallbackAnswer.text,
    ]);
    expect(orchestrator.getLastCitations('123')).toEqual([]);
  });

  it('should keep chats apart', async () => {
    answer.mockResolvedValue(knowledgeBaseAnswer);

    await manager.executeConversation('123', 'What is the return policy?', asContext(createMockContext('a')));

    expect(orchestrator.getConversationHistory('456')).toEqual([]);
  });

  it('should refuse a second turn while the first is pending', async () => {
    let release: (response: AssistantResponse) => void = () => undefined;
    answer.mockReturnValue(
      new Promise<AssistantResponse>((resolve) => {
        release = resolve;
      })
    );
    const busy = createMockContext('Is shipping free?');

    const pending = manager.executeConversation('123', 'What is the return policy?', asContext(createMockContext('a')));
    await expect(
      manager.executeConversation('123', 'Is shipping free?', asContext(busy))
    ).resolves.toBe(false);

    release(knowledgeBaseAnswer);
    await expect(pending).resolves.toBe(true);

    expect(answer).toHaveBeenCalledTimes(1);
    expect(busy.sendChatAction).not.toHaveBeenCalled();
    expect(busy.reply).not.toHaveBeenCalled();

    answer.mockResolvedValue(fallbackAnswer);
    await expect(
      manager.executeConversation('123', 'Tell me a joke', asContext(createMockContext('c')))
    ).resolves.toBe(true);
    expect(orchestrator.getConversationHistory('123')).toHaveLength(4);
  });

  it('should drop an answer that arrives after the chat was cleared', async () => {
    let release: (response: AssistantResponse) => void = () => undefined;
    answer.mockReturnValue(
      new Promise<AssistantResponse>((resolve) => {
        release = resolve;
      })
    );
    const mock = createMockContext('What is the return policy?');

    const pending = manager.executeConversation('123', 'What is the return policy?', asContext(mock));
    orchestrator.stopSession('123', 'User cleared the chat');
    const fresh = orchestrator.getOrCreateSession('123');

    release(knowledgeBaseAnswer);
    await pending;

    expect(mock.reply).not.toHaveBeenCalled();
    expect(orchestrator.getSession('123')?.sessionId).toBe(fresh.sessionId);
    expect(orchestrator.getConversationHistory('123')).toEqual([]);
  });

  it('should release the chat when sending fails', async () => {
    answer.mockResolvedValue(knowledgeBaseAnswer);
    const mock = createMockContext('What is the return policy?');
    mock.reply.mockRejectedValue(new Error('Telegram unavailable'));

    await expect(
      manager.executeConversation('123', 'What is the return policy?', asContext(mock))
    ).rejects.toThrow('Telegram unavailable');

    await expect(
      manager.executeConversation('123', 'Is shipping free?', asContext(createMockContext('b')))
    ).resolves.toBe(true);
  });
});
