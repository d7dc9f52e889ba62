import { EnvSchema, type Config } from '@basic-gate/shared';
import { ConfigurationError } from './errors';

export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return result.data;
}
