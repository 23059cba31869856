import { ChatSession } from './session.interface';

/**
 * Injection token for ISessionRepository
 * Use this token when injecting the repository via @Inject()
 */
export const SESSION_REPOSITORY = 'SESSION_REPOSITORY';

export interface ISessionRepository {
  // Session lifecycle
  saveSession(session: ChatSession): void;
  getSession(chatId: string): ChatSession | null;

  // Cleanup
  cleanupOldStoppedSessions(cutoffDate: Date): number;
}
