import { SourceCitation, TranscriptTurn } from '@kb-chat/shared/types';

export enum SessionStatus {
  ACTIVE = 'active', // Default state - session is active
  STOPPED = 'stopped', // Ended via /new or /clear
}

export interface ChatSession {
  sessionId: string; // Format: "chat123-1234567890-1"
  chatId: string;
  status: SessionStatus;
  createdAt: Date;
  updatedAt: Date;
  conversationHistory: TranscriptTurn[];
  lastCitations: SourceCitation[]; // References behind the latest answer
  metadata?: Record<string, unknown>;
}
