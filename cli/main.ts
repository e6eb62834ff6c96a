#!/usr/bin/env node
import { config } from 'dotenv';

// Load .env.local, then .env, before anything reads process.env
config({ path: ['.env.local', '.env'] });

import { buildProgram, CliOptions, toConfigInput } from './program';
import { loadReaderFactory } from './readerLoader';
import { resolveBridgeConfig, BridgeConfig } from '../bridge/BridgeConfig';
import { TelemetryBridge } from '../bridge/TelemetryBridge';
import { IntervalPollingEngine } from '../device-polling/IntervalPollingEngine';
import { PollingEngine } from '../device-polling/PollingEngine';
import { WebSocketPublishChannel } from '../publish-channel/WebSocketPublishChannel';
import { loadChannelCredentials } from '../publish-channel/ChannelAuth';
import { BridgeError, BRIDGE_ERROR_CODES, errorMessage, isBridgeError } from '../shared/BridgeErrors';
import { configureLogging, createLogger } from '../shared/Logger';

const logger = createLogger('Main');

async function createPollingEngine(config: BridgeConfig, readerModule: string | undefined): Promise<PollingEngine | undefined> {
  if (config.synthetic) return undefined;

  if (!readerModule) {
    throw new BridgeError(
      BRIDGE_ERROR_CODES.INVALID_CONFIG,
      'A --reader module is required to poll the sensor (or use --synthetic)'
    );
  }
  return new IntervalPollingEngine(await loadReaderFactory(readerModule));
}

async function runBridge(options: CliOptions): Promise<void> {
  const config = resolveBridgeConfig(toConfigInput(options));
  configureLogging({ verbose: config.verbose, filePath: options.logFile });

  logger.info(
    `Configuration: device=${config.deviceHost}:${config.devicePort} bind=${config.bindAddress} ` +
    `cycle=${config.cycleSeconds}s timeout=${config.timeoutSeconds}s mode=${config.mode} ` +
    `synthetic=${config.synthetic} injectZero=${config.injectZero}`
  );

  const pollingEngine = await createPollingEngine(config, options.reader);
  const channel = new WebSocketPublishChannel({ credentials: loadChannelCredentials() });

  const bridge = new TelemetryBridge(
    {
      mode: config.mode,
      device: { host: config.deviceHost, port: config.devicePort },
      bindAddress: config.bindAddress,
      cycleSeconds: config.cycleSeconds,
      timeoutSeconds: config.timeoutSeconds,
      verbose: config.verbose,
    },
    { channel, pollingEngine }
  );

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    bridge.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  process.on('SIGUSR2', () => {
    bridge.toggleActive();
  });

  if (config.synthetic) {
    await bridge.startSynthetic({ injectZero: config.injectZero });
  } else {
    await bridge.start();
  }
}

process.on('unhandledRejection', (error) => {
  logger.error('Unhandled promise rejection:', error);
});

buildProgram(runBridge)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(isBridgeError(error) ? `${error.code}: ${error.message}` : `Fatal error: ${errorMessage(error)}`);
    process.exit(1);
  });
