import { registerAs } from '@nestjs/config';

export default registerAs('typesense', () => ({
  baseURL: process.env.TYPESENSE_URL || 'http://localhost:8108',
  apiKey: process.env.TYPESENSE_API_KEY || undefined,
  timeout: parseInt(process.env.TYPESENSE_TIMEOUT ?? '', 10) || 10000,
  // Liveness probe used by initialize and healthz
  healthTimeout: parseInt(process.env.TYPESENSE_HEALTH_TIMEOUT ?? '', 10) || 5000,
  maxRetries: parseInt(process.env.TYPESENSE_MAX_RETRIES ?? '', 10) || 3,
  retryDelay: parseInt(process.env.TYPESENSE_RETRY_DELAY ?? '', 10) || 300,
}));
