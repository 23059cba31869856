/**
 * advanceTranscript Tests
 */

import {
  AssistantResponse,
  ResponseOrigin,
  Transcript,
  TurnRole,
} from '@kb-chat/shared/types';
import { advanceTranscript } from './transcript';

describe('advanceTranscript', () => {
  const at = new Date('2025-01-01T00:00:00Z');
  const now = () => at;

  const reply = (text: string): AssistantResponse => ({
    text,
    origin: ResponseOrigin.KNOWLEDGE_BASE,
    citations: [],
  });

  it('should append the user turn and the assistant reply', async () => {
    const respond = jest.fn().mockResolvedValue(reply('Returns accepted within 30 days.'));

    const outcome = await advanceTranscript(
      [],
      'What is the return policy?',
      respond,
      now
    );

    expect(respond).toHaveBeenCalledWith('What is the return policy?');
    expect(outcome.transcript).toEqual([
      { role: TurnRole.USER, text: 'What is the return policy?', timestamp: at },
      {
        role: TurnRole.ASSISTANT,
        text: 'Returns accepted within 30 days.',
        timestamp: at,
      },
    ]);
    expect(outcome.response.text).toBe('Returns accepted within 30 days.');
  });

  it('should keep earlier turns in order and leave the input untouched', async () => {
    const previous: Transcript = [
      { role: TurnRole.USER, text: 'Question 1', timestamp: at },
      { role: TurnRole.ASSISTANT, text: 'Answer 1', timestamp: at },
    ];
    const snapshot = [...previous];

    const outcome = await advanceTranscript(
      previous,
      'Question 2',
      async () => reply('Answer 2'),
      now
    );

    expect(previous).toEqual(snapshot);
    expect(outcome.transcript.map((turn) => turn.text)).toEqual([
      'Question 1',
      'Answer 1',
      'Question 2',
      'Answer 2',
    ]);
  });

  it('should add only the assistant reply for a blank query', async () => {
    const outcome = await advanceTranscript(
      [],
      '   ',
      async () => reply('fallback'),
      now
    );

    expect(outcome.transcript).toEqual([
      { role: TurnRole.ASSISTANT, text: 'fallback', timestamp: at },
    ]);
  });
});
