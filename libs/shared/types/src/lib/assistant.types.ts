import { QueryCategory, ResponseOrigin, TurnRole } from './enums';

export interface ClassifiedQuery {
  text: string;
  category: QueryCategory;
}

/**
 * One retrieved reference backing a knowledge-base answer
 */
export interface SourceCitation {
  excerpt?: string;
  uri?: string;
}

export interface AssistantResponse {
  text: string;
  origin: ResponseOrigin;
  citations: SourceCitation[];
}

export interface TranscriptTurn {
  role: TurnRole;
  text: string;
  timestamp: Date;
}

export type Transcript = ReadonlyArray<TranscriptTurn>;
