import { Injectable } from '@nestjs/common';
import { ISessionRepository, ChatSession, SessionStatus } from '../interfaces';

@Injectable()
export class InMemorySessionRepository implements ISessionRepository {
  private sessions = new Map<string, ChatSession>();

  saveSession(session: ChatSession): void {
    this.sessions.set(session.chatId, session);
  }

  getSession(chatId: string): ChatSession | null {
    return this.sessions.get(chatId) || null;
  }

  cleanupOldStoppedSessions(cutoffDate: Date): number {
    let cleanedCount = 0;
    const cutoffTime = cutoffDate.getTime();

    for (const [chatId, session] of this.sessions.entries()) {
      if (
        session.status === SessionStatus.STOPPED &&
        session.updatedAt.getTime() < cutoffTime
      ) {
        this.sessions.delete(chatId);
        cleanedCount++;
      }
    }

    return cleanedCount;
  }
}
