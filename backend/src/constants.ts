// アプリケーション定数

// ========================================
// Basic 認証
// ========================================

// Authorization ヘッダーのスキーム（大文字小文字を区別、区切りは半角スペース1つ）
export const BASIC_SCHEME_PREFIX = 'Basic ';

// WWW-Authenticate チャレンジで提示する realm
export const REALM = 'Private Area';

// ========================================
// サーバー
// ========================================

export const PROTECTED_BODY = 'Welcome to the party.';
