export * from './request-deadline.service';
export * from './knowledge-base.gateway';
export * from './foundation-model.gateway';
export * from './bedrock-clients.provider';
