import { Injectable, Logger, Inject } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import {
  SourceCitation,
  Transcript,
  TranscriptTurn,
} from '@kb-chat/shared/types';
import {
  ISessionRepository,
  SESSION_REPOSITORY,
} from './interfaces/session-repository.interface';
import { ChatSession, SessionStatus } from './interfaces/session.interface';

@Injectable()
export class SessionOrchestrator {
  private readonly logger = new Logger(SessionOrchestrator.name);
  private readonly STOPPED_SESSION_CLEANUP_DAYS = 7; // Clean up STOPPED sessions after 7 days
  private sessionSequence = 0;

  constructor(
    @Inject(SESSION_REPOSITORY)
    private readonly sessionRepository: ISessionRepository
  ) {}

  /**
   * Get or create session for a chat.
   * Always returns an ACTIVE session.
   * If no session exists or previous was STOPPED, creates a new one.
   */
  getOrCreateSession(chatId: string): ChatSession {
    const existing = this.sessionRepository.getSession(chatId);
    if (existing && existing.status === SessionStatus.ACTIVE) {
      this.logger.debug(`Using existing session ${existing.sessionId} for chat ${chatId}`);
      return existing;
    }

    this.logger.log(`Creating new session for chat ${chatId}`);
    const newSession: ChatSession = {
      sessionId: this.generateSessionId(chatId),
      chatId,
      status: SessionStatus.ACTIVE,
      createdAt: new Date(),
      updatedAt: new Date(),
      conversationHistory: [],
      lastCitations: [],
      metadata: {},
    };

    this.sessionRepository.saveSession(newSession);
    return newSession;
  }

  /**
   * Get current session (returns null if STOPPED or doesn't exist)
   */
  getSession(chatId: string): ChatSession | null {
    const session = this.sessionRepository.getSession(chatId);
    return session?.status === SessionStatus.ACTIVE ? session : null;
  }

  /**
   * Stop session (sets status to STOPPED). Its transcript is discarded with it.
   */
  stopSession(chatId: string, reason?: string): void {
    const session = this.sessionRepository.getSession(chatId);
    if (!session) {
      this.logger.warn(`No session found for chat ${chatId}`);
      return;
    }

    this.logger.log(
      `Stopping session ${session.sessionId} for chat ${chatId}` +
        (reason ? `: ${reason}` : '')
    );

    session.status = SessionStatus.STOPPED;
    session.updatedAt = new Date();
    if (reason && session.metadata) {
      session.metadata['stopReason'] = reason;
    }

    this.sessionRepository.saveSession(session);
  }

  /**
   * Store the transcript produced by one exchange.
   *
   * Only extends the history it was built from: if the session was reset
   * or another turn was stored while the answer was in flight, the turn is
   * dropped.
   */
  commitTurn(
    chatId: string,
    sessionId: string,
    baseLength: number,
    transcript: Transcript,
    citations: SourceCitation[]
  ): boolean {
    const session = this.getSession(chatId);
    if (!session || session.sessionId !== sessionId) {
      this.logger.warn(
        `Session ${sessionId} for chat ${chatId} is no longer active, dropping turn`
      );
      return false;
    }

    if (session.conversationHistory.length !== baseLength) {
      this.logger.warn(
        `[${chatId}] History changed from ${baseLength} to ${session.conversationHistory.length} turns, dropping turn`
      );
      return false;
    }

    session.conversationHistory = [...transcript];
    session.lastCitations = [...citations];
    session.updatedAt = new Date();
    this.sessionRepository.saveSession(session);
    return true;
  }

  /**
   * Get conversation history for session
   */
  getConversationHistory(chatId: string): TranscriptTurn[] {
    const session = this.getSession(chatId);
    return session?.conversationHistory || [];
  }

  /**
   * References behind the latest knowledge-base answer
   */
  getLastCitations(chatId: string): SourceCitation[] {
    const session = this.getSession(chatId);
    return session?.lastCitations || [];
  }

  /**
   * Cleanup old STOPPED sessions (runs daily)
   * ACTIVE sessions never expire automatically
   */
  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  cleanupStoppedSessions(): number {
    const cutoffDate = new Date();
    cutoffDate.setDate(cutoffDate.getDate() - this.STOPPED_SESSION_CLEANUP_DAYS);

    const count = this.sessionRepository.cleanupOldStoppedSessions(cutoffDate);
    if (count > 0) {
      this.logger.log(
        `Cleaned up ${count} STOPPED sessions older than ${this.STOPPED_SESSION_CLEANUP_DAYS} days`
      );
    }
    return count;
  }

  /**
   * Get session status
   */
  getSessionStatus(chatId: string): SessionStatus | null {
    const session = this.sessionRepository.getSession(chatId);
    return session?.status || null;
  }

  /**
   * Generate session ID (format: chat{chatId}-{timestamp}-{sequence})
   */
  private generateSessionId(chatId: string): string {
    this.sessionSequence += 1;
    return `chat${chatId}-${Date.now()}-${this.sessionSequence}`;
  }
}
