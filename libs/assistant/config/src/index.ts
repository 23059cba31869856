export * from './lib/configuration.error';
export * from './lib/assistant.config';
export { default as assistantConfig } from './lib/assistant.config';
