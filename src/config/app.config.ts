import 'dotenv/config';
import { RetryOptions } from '../utils/retry.util';

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export interface AppConfig {
  data: {
    schedulePath: string;
    clauseReferencePath: string;
    inputCsvPath: string;
    outputCsvPath: string;
  };
  scheduleRetention: number;
  explanationTimeoutMs: number;
  batchSize: number;
  apiPort: number;
  retry: RetryOptions;
  openai?: OpenAIConfig;   // natural language parsing falls back to patterns without it
}

function readInt(name: string, fallback: string, min: number, max: number): number {
  const value = parseInt(process.env[name] || fallback, 10);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  const openaiApiKey = process.env.OPENAI_API_KEY;

  const jitterFactor = parseFloat(process.env.RETRY_JITTER_FACTOR || '0.1');
  if (Number.isNaN(jitterFactor) || jitterFactor < 0 || jitterFactor > 1) {
    throw new Error('RETRY_JITTER_FACTOR must be between 0 and 1');
  }

  return {
    data: {
      schedulePath: process.env.SCHEDULE_PATH || './data/tariff-schedule.json',
      clauseReferencePath: process.env.CLAUSE_REFERENCE_PATH || './data/clause-references.json',
      inputCsvPath: process.env.INPUT_CSV_PATH || './data/input-port-calls.csv',
      outputCsvPath: process.env.OUTPUT_CSV_PATH || './data/output-port-dues.csv'
    },
    scheduleRetention: readInt('SCHEDULE_RETENTION', '5', 1, 100),
    explanationTimeoutMs: readInt('EXPLANATION_TIMEOUT_MS', '500', 1, 60000),
    batchSize: readInt('BATCH_SIZE', '5', 1, 50),
    apiPort: readInt('API_PORT', '3001', 1, 65535),
    retry: {
      maxRetries: readInt('RETRY_MAX_ATTEMPTS', '3', 0, 10),
      baseDelay: readInt('RETRY_BASE_DELAY_MS', '1000', 0, 60000),
      maxDelay: readInt('RETRY_MAX_DELAY_MS', '10000', 0, 300000),
      jitterFactor
    },
    ...(openaiApiKey
      ? {
          openai: {
            apiKey: openaiApiKey,
            model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
            maxTokens: readInt('OPENAI_MAX_TOKENS', '300', 16, 4096)
          }
        }
      : {})
  };
}
