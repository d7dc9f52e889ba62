import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './config';
import { staticCredentialValidator } from './services/credentialValidator';

const config = loadConfig();

const app = createApp({
  validation: staticCredentialValidator(config.BASIC_AUTH_CREDENTIAL),
  requestLogging: config.ENVIRONMENT === 'development',
});

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log(`Listening on http://localhost:${info.port} (${config.ENVIRONMENT})`);
});
