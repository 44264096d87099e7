// Agent Orchestration API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { buildServer, createConversationServiceFromEnv } from './app.js';
import { getProvider } from './providers/index.js';
import { ProviderInferenceBackend } from './providers/inference-backend.js';
import { initializeTools } from './services/tools/index.js';

const PORT = env.PORT;
const HOST = env.HOST;

// Initialize tools
const registry = initializeTools();

const backend = new ProviderInferenceBackend({
  provider: getProvider(env.INFERENCE_PROVIDER),
  model: env.INFERENCE_MODEL,
});

const server = await buildServer(createConversationServiceFromEnv(backend, registry), {
  level: env.LOG_LEVEL,
  transport: {
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Agent orchestration API listening on http://${HOST}:${PORT}`);
  console.log(`Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
