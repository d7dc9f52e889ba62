import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { ErrorResponse, HealthResponse } from '@basic-gate/shared';
import type { AppEnv, Validation } from './types';
import { basicAuth } from './middleware/basicAuth';
import speakeasy from './routes/speakeasy';

export interface AppOptions {
  validation: Validation<AppEnv>;
  // リクエストログ（開発環境のみ）
  requestLogging?: boolean;
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  if (options.requestLogging) {
    app.use('*', logger());
  }

  // ヘルスチェック（認証不要）
  app.get('/health', (c) => c.json<HealthResponse>({ status: 'ok' }));

  // 認証ミドルウェア
  app.use('/speakeasy', basicAuth({ validation: options.validation }));

  // 保護されたルート
  app.route('/speakeasy', speakeasy);

  // 404ハンドラ
  app.notFound((c) => c.json<ErrorResponse>({ error: 'Not found' }, 404));

  // エラーハンドラ
  app.onError((err, c) => {
    console.error('Error:', err);
    return c.json<ErrorResponse>({ error: 'Internal server error' }, 500);
  });

  return app;
}

export { basicAuth, authenticate, parseAuthorization } from './middleware/basicAuth';
export type { BasicAuthOptions } from './middleware/basicAuth';
export { staticCredentialValidator } from './services/credentialValidator';
export { ConfigurationError, MalformedCredentialsError } from './errors';
export { basicAuthorizationHeader } from './utils/base64';
export type { AppEnv, AuthAttempt, Credentials, Decision, Outcome, Validation, ValidationResult } from './types';
