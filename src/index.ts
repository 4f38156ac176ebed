// Main Application Entry Point - Remote Volume Control
import 'dotenv/config';
import { Configuration } from './interfaces';
import {
  AudioAdapterFactory,
  ConfigurationManagerImpl,
  ErrorHandler,
  ExecFileCommandRunner,
  VolumeControllerImpl
} from './services';
import { VolumeControlServer } from './server';

export async function createVolumeControlServer(config: Configuration): Promise<VolumeControlServer> {
  const runner = new ExecFileCommandRunner(config.commandTimeoutMs);
  const adapter = await AudioAdapterFactory.createForHost(config.audioBackend, runner, {
    sinkName: config.sinkName,
    mixerControl: config.mixerControl
  });

  if (!adapter.isSupported()) {
    console.warn(`[Startup] The ${adapter.backend} adapter targets Linux hosts; requests will likely fail on ${process.platform}`);
  }
  console.log(`[Startup] Using ${adapter.backend} backend, step ${config.step}%`);

  const controller = new VolumeControllerImpl(adapter, { step: config.step });
  return new VolumeControlServer(controller, {
    host: config.host,
    port: config.port,
    backend: adapter.backend,
    errorHandler: new ErrorHandler()
  });
}

async function main(): Promise<void> {
  const configManager = new ConfigurationManagerImpl(process.env.CONFIG_DIR);
  const config = await configManager.loadConfiguration();

  const problems = configManager.validateConfiguration();
  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const server = await createVolumeControlServer(config);

  const shutdown = (signal: NodeJS.Signals): void => {
    console.log(`Received ${signal}`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to stop server:', error);
        process.exit(1);
      });
  };

  // Graceful shutdown
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
  console.log('Access from your phone at http://<host-ip>:' + config.port);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to start volume control server:', error);
    process.exit(1);
  });
}
