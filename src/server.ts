// =============================================================================
// CLAIMER — Main Server
// =============================================================================

import { createApp, SERVICE_NAME, SERVICE_VERSION } from './app';
import { config } from './config';

const app = createApp();

app.listen(config.port, () => {
  console.log(`[Server] ${SERVICE_NAME} ${SERVICE_VERSION} listening on port ${config.port} (${config.nodeEnv})`);
  console.log(`[Server] Deferred claims point to ${config.claims.decrypterUrl}`);
});
