import { registerAs } from '@nestjs/config';

export default registerAs('contentServer', () => ({
  baseURL: process.env.CONTENT_SERVER_URL || 'http://localhost:8080',
  // The full repo is fetched in one request and can be large
  timeout: parseInt(process.env.CONTENT_SERVER_TIMEOUT ?? '', 10) || 30000,
  maxRetries: parseInt(process.env.CONTENT_SERVER_MAX_RETRIES ?? '', 10) || 3,
  retryDelay: parseInt(process.env.CONTENT_SERVER_RETRY_DELAY ?? '', 10) || 300,
}));
