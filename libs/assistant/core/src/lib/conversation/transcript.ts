import {
  AssistantResponse,
  Transcript,
  TranscriptTurn,
  TurnRole,
} from '@kb-chat/shared/types';

export interface TurnOutcome {
  transcript: Transcript;
  response: AssistantResponse;
}

export type Responder = (query: string) => Promise<AssistantResponse>;

/**
 * Advance a session transcript by one exchange.
 *
 * Free of any chat-surface dependency: the caller supplies the responder and
 * stores the returned transcript. The input transcript is left untouched.
 * Blank queries add no user turn, only the assistant's reply.
 */
export async function advanceTranscript(
  transcript: Transcript,
  query: string,
  respond: Responder,
  now: () => Date = () => new Date()
): Promise<TurnOutcome> {
  const turns: TranscriptTurn[] = [...transcript];

  if (query.trim() !== '') {
    turns.push({ role: TurnRole.USER, text: query, timestamp: now() });
  }

  const response = await respond(query);
  turns.push({
    role: TurnRole.ASSISTANT,
    text: response.text,
    timestamp: now(),
  });

  return { transcript: turns, response };
}
