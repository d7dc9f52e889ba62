import type { Context, Env as HonoEnv } from 'hono';
import type { AuthAttempt, Decision } from '@basic-gate/shared';

export type { AuthAttempt, Credentials, Decision } from '@basic-gate/shared';

// デモアプリの Hono 環境
export interface AppEnv {
  Variables: {
    username: string;
  };
}

// 検証関数は受け取った Context をそのまま（注釈を付けて）返す
export type ValidationResult<E extends HonoEnv = HonoEnv> = readonly [Context<E>, Decision];

export type Validation<E extends HonoEnv = HonoEnv> = (
  c: Context<E>,
  attempt: AuthAttempt,
) => ValidationResult<E> | Promise<ValidationResult<E>>;

// パイプラインを続行するか、401 で打ち切るか
export type Outcome<E extends HonoEnv = HonoEnv> =
  | { type: 'continue'; context: Context<E> }
  | { type: 'terminated'; context: Context<E>; response: Response };
