export * from './lib/assistant.module';
export * from './lib/assistant.service';
export * from './lib/assistant-messages';
export * from './lib/errors';
export * from './lib/bedrock';
export * from './lib/classifier';
export * from './lib/dispatcher';
export * from './lib/conversation';
