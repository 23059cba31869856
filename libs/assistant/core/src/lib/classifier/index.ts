export * from './classification-policy.interface';
export * from './keyword-classification.policy';
export * from './model-classification.policy';
export * from './query-classifier.service';
