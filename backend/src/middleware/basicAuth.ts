import type { Context, Env as HonoEnv, MiddlewareHandler } from 'hono';
import { ABSENT, credentials } from '@basic-gate/shared';
import type { AuthAttempt, Outcome, Validation } from '../types';
import { BASIC_SCHEME_PREFIX, REALM } from '../constants';
import { ConfigurationError, MalformedCredentialsError } from '../errors';
import { decodeBase64 } from '../utils/base64';

export interface BasicAuthOptions<E extends HonoEnv = HonoEnv> {
  validation: Validation<E>;
}

/**
 * Authorization ヘッダーを AuthAttempt に変換する。
 *
 * ヘッダーなし・Basic 以外のスキームは absent。Basic だが payload が壊れている場合は
 * MalformedCredentialsError を投げる。
 */
export function parseAuthorization(header: string | undefined): AuthAttempt {
  if (header === undefined) return ABSENT;

  // 複数の Authorization は Headers で ", " 連結されるので先頭のみ使う
  const [first = ''] = header.split(',', 1);
  if (!first.startsWith(BASIC_SCHEME_PREFIX)) return ABSENT;

  const decoded = decodeBase64(first.slice(BASIC_SCHEME_PREFIX.length));
  if (decoded === null) {
    throw new MalformedCredentialsError('Basic credentials are not valid base64-encoded UTF-8');
  }

  // パスワード中のコロンは保持する
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    throw new MalformedCredentialsError('Basic credentials must be in "username:password" form');
  }

  return credentials(decoded.slice(0, separator), decoded.slice(separator + 1));
}

export async function authenticate<E extends HonoEnv>(
  c: Context<E>,
  validation: Validation<E>,
): Promise<Outcome<E>> {
  const attempt = parseAuthorization(c.req.header('Authorization'));
  const [context, decision] = await validation(c, attempt);

  switch (decision) {
    case 'authorized':
      return { type: 'continue', context };
    case 'unauthorized': {
      context.header('WWW-Authenticate', `Basic realm="${REALM}"`);
      context.status(401);
      const response = context.body('');
      return { type: 'terminated', context, response };
    }
    default:
      throw new Error(`Unknown decision: ${String(decision)}`);
  }
}

function assertOptions<E extends HonoEnv>(options: BasicAuthOptions<E> | undefined): void {
  if (!options || typeof options.validation !== 'function') {
    throw new ConfigurationError('basicAuth requires a "validation" function');
  }
}

/**
 * HTTP Basic 認証ミドルウェア。
 *
 * 判定は `validation` に委譲し、unauthorized の場合は
 * `WWW-Authenticate` 付きの空の 401 を返してチェーンを打ち切る。
 */
export function basicAuth<E extends HonoEnv = HonoEnv>(options: BasicAuthOptions<E>): MiddlewareHandler<E> {
  assertOptions(options);
  const { validation } = options;

  return async (c, next) => {
    const outcome = await authenticate(c, validation);
    if (outcome.type === 'terminated') {
      return outcome.response;
    }
    await next();
  };
}
