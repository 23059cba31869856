import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  ClassifierPolicyType,
  GenericResponseMode,
} from '@kb-chat/shared/types';
import { ConfigurationError } from './configuration.error';

export const REQUIRED_ENV_VARS = [
  'AWS_REGION',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'MODEL_ID',
  'KNOWLEDGE_BASE_ID',
  'PRODUCT_NAME',
  'APP_TITLE',
] as const;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const required = z.string().trim().min(1);

const envSchema = z.object({
  AWS_REGION: required,
  AWS_ACCESS_KEY_ID: required,
  AWS_SECRET_ACCESS_KEY: required,
  MODEL_ID: required,
  KNOWLEDGE_BASE_ID: required,
  PRODUCT_NAME: required,
  APP_TITLE: required,
  PRODUCT_KEYWORDS: z.string().optional(),
  CLASSIFIER_POLICY: z
    .nativeEnum(ClassifierPolicyType)
    .default(ClassifierPolicyType.KEYWORD),
  GENERIC_RESPONSE_MODE: z
    .nativeEnum(GenericResponseMode)
    .default(GenericResponseMode.FALLBACK),
  KB_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export interface AwsCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
}

export interface AssistantConfig {
  readonly region: string;
  readonly credentials: AwsCredentials;
  readonly modelId: string;
  readonly knowledgeBaseId: string;
  readonly productName: string;
  readonly appTitle: string;
  readonly productKeywords: readonly string[];
  readonly classifierPolicy: ClassifierPolicyType;
  readonly genericResponseMode: GenericResponseMode;
  readonly requestTimeoutMs: number;
}

const requiredNames: ReadonlySet<string> = new Set(REQUIRED_ENV_VARS);

/**
 * Build the assistant configuration from a process environment.
 *
 * Blank values are treated as unset. Throws ConfigurationError listing every
 * missing required variable, or every optional variable with an invalid value.
 */
export function loadAssistantConfig(
  env: NodeJS.ProcessEnv = process.env
): AssistantConfig {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[name] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const missing = new Set<string>();
    const invalid: string[] = [];

    for (const issue of parsed.error.issues) {
      const name = String(issue.path[0]);
      if (requiredNames.has(name)) {
        missing.add(name);
      } else {
        invalid.push(`${name} (${issue.message})`);
      }
    }

    if (missing.size > 0) {
      const names = REQUIRED_ENV_VARS.filter((name) => missing.has(name));
      throw new ConfigurationError(
        `Missing required environment variables: ${names.join(', ')}`,
        names
      );
    }

    throw new ConfigurationError(
      `Invalid environment variables: ${invalid.join(', ')}`,
      invalid
    );
  }

  const values = parsed.data;
  const productKeywords = (values.PRODUCT_KEYWORDS ?? '')
    .split(',')
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);

  return Object.freeze({
    region: values.AWS_REGION,
    credentials: Object.freeze({
      accessKeyId: values.AWS_ACCESS_KEY_ID,
      secretAccessKey: values.AWS_SECRET_ACCESS_KEY,
    }),
    modelId: values.MODEL_ID,
    knowledgeBaseId: values.KNOWLEDGE_BASE_ID,
    productName: values.PRODUCT_NAME,
    appTitle: values.APP_TITLE,
    productKeywords: Object.freeze(productKeywords),
    classifierPolicy: values.CLASSIFIER_POLICY,
    genericResponseMode: values.GENERIC_RESPONSE_MODE,
    requestTimeoutMs: values.KB_REQUEST_TIMEOUT_MS,
  });
}

export default registerAs('assistant', () => loadAssistantConfig(process.env));
