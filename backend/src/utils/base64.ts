import { BASIC_SCHEME_PREFIX } from '../constants';

// 標準 base64（URL-safe ではない）、パディング必須
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// 不正な UTF-8 は置換せずにエラーにする
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function decodeBase64(encoded: string): string | null {
  if (!BASE64_PATTERN.test(encoded)) return null;

  const binary = atob(encoded);
  const bytes = Uint8Array.from(binary, (ch) => ch.charCodeAt(0));
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
}

export function encodeBase64(text: string): string {
  const bytes = new TextEncoder().encode(text);
  const binary = bytes.reduce((acc, byte) => acc + String.fromCharCode(byte), '');
  return btoa(binary);
}

export function basicAuthorizationHeader(username: string, password: string): string {
  return `${BASIC_SCHEME_PREFIX}${encodeBase64(`${username}:${password}`)}`;
}
