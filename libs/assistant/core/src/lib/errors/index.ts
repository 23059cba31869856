export * from './external-service.error';
export * from './classification.error';
