/**
 * Shared enums used across the entire application
 * Config, Assistant core, and Bot all reference these constants
 */

// ============================================================================
// Query Classification
// ============================================================================

export enum QueryCategory {
  IN_DOMAIN = 'in-domain',
  GENERIC = 'generic',
}

export enum ClassifierPolicyType {
  KEYWORD = 'keyword',
  MODEL = 'model',
}

// ============================================================================
// Responses
// ============================================================================

export enum ResponseOrigin {
  KNOWLEDGE_BASE = 'knowledge-base',
  FALLBACK = 'fallback',
  MODEL = 'model',
  ERROR = 'error',
}

export enum GenericResponseMode {
  FALLBACK = 'fallback',
  MODEL = 'model',
}

// ============================================================================
// Transcript
// ============================================================================

export enum TurnRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}
