export * from './lib/enums';
export * from './lib/assistant.types';
