import { loadGatewayConfig } from '@wxgate/config';
import { closeDb } from '@wxgate/db';
import { runServiceAndExit } from '@wxgate/http';
import { buildGatewayApp } from './app.js';

const config = loadGatewayConfig();

runServiceAndExit({
  serviceName: 'gateway',
  buildApp: () => buildGatewayApp({ config }),
  host: config.GATEWAY_HOST,
  port: config.GATEWAY_PORT,
  onShutdown: closeDb
});
