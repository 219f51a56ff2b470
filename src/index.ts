#!/usr/bin/env node
// src/index.ts
import 'dotenv/config';
import {
  loadCalDavConfig,
  loadCalendarSettings,
  loadServerConfig,
  validateConfig,
} from './config/config.js';
import { createCalendarService } from './services/calendar.service.js';
import { createApp } from './server.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('main');

function main(): void {
  const { isValid, missing } = validateConfig(process.env);
  if (!isValid) {
    logger.error(`Missing required environment variables: ${missing.join(', ')}`);
    process.exit(1);
  }

  const serverConfig = loadServerConfig(process.env);
  setLogLevel(serverConfig.logLevel);

  const settings = loadCalendarSettings(process.env);
  const service = createCalendarService(loadCalDavConfig(process.env), settings);
  const app = createApp(service, serverConfig);

  const server = app.listen(serverConfig.port, serverConfig.host, () => {
    logger.info(
      `${serverConfig.serverName} v${serverConfig.serverVersion} listening on ${serverConfig.host}:${serverConfig.port}`,
    );
    logger.info(`Environment: ${serverConfig.environment}, time zone: ${settings.timezone}`);
  });

  const shutdown = (): void => {
    logger.info('Shutting down...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
