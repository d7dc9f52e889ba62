import { z } from 'zod';

// ============================================
// 認証スキーマ
// ============================================

export const CredentialsSchema = z.object({
  type: z.literal('credentials'),
  username: z.string(),
  password: z.string(),
});
export type Credentials = z.infer<typeof CredentialsSchema>;

export const AbsentSchema = z.object({
  type: z.literal('absent'),
});
export type Absent = z.infer<typeof AbsentSchema>;

// Authorization ヘッダーから得られる値（資格情報 or なし）
export const AuthAttemptSchema = z.discriminatedUnion('type', [CredentialsSchema, AbsentSchema]);
export type AuthAttempt = z.infer<typeof AuthAttemptSchema>;

export type Decision = 'authorized' | 'unauthorized';

// ============================================
// 設定スキーマ
// ============================================

export const EnvSchema = z.object({
  // "user:pass" 形式
  BASIC_AUTH_CREDENTIAL: z.string().includes(':', { message: 'Expected "user:pass" format' }),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  ENVIRONMENT: z.enum(['development', 'production']).default('development'),
});
export type Config = z.infer<typeof EnvSchema>;

// ============================================
// API レスポンススキーマ
// ============================================

export const ErrorResponseSchema = z.object({
  error: z.string(),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

// ============================================
// ユーティリティ関数
// ============================================

export function credentials(username: string, password: string): Credentials {
  return { type: 'credentials', username, password };
}

export const ABSENT: Absent = { type: 'absent' };

export function isCredentials(attempt: AuthAttempt): attempt is Credentials {
  return attempt.type === 'credentials';
}
