import { timingSafeEqual } from 'hono/utils/buffer';
import { isCredentials } from '@basic-gate/shared';
import type { AppEnv, Validation } from '../types';
import { ConfigurationError } from '../errors';

/**
 * 設定された "user:pass" の組だけを許可する検証関数を作る。
 * 認証に成功したユーザー名は `username` 変数に入る。
 */
export function staticCredentialValidator(credential: string): Validation<AppEnv> {
  const separator = credential.indexOf(':');
  if (separator === -1) {
    throw new ConfigurationError('Credential must be in "user:pass" format');
  }
  const expectedUsername = credential.slice(0, separator);
  const expectedPassword = credential.slice(separator + 1);

  return async (c, attempt) => {
    if (!isCredentials(attempt)) {
      return [c, 'unauthorized'];
    }

    // 両方とも比較してから判定する
    const usernameMatches = await timingSafeEqual(attempt.username, expectedUsername);
    const passwordMatches = await timingSafeEqual(attempt.password, expectedPassword);
    if (!usernameMatches || !passwordMatches) {
      return [c, 'unauthorized'];
    }

    c.set('username', attempt.username);
    return [c, 'authorized'];
  };
}
