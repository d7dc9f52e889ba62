// 設定不備（起動時に検出）
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Basic スキームだが payload が base64 でない、またはコロンを含まない
export class MalformedCredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCredentialsError';
  }
}
