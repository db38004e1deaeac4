#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { CONFIG, configWarnings } from './config.js';
import { createInstallEngine, createSystemEngine, type AppSettings } from './app.js';
import { ui } from './cli/ui.js';
import { errorMessage } from './errors.js';
import { configureLogging, createLogger } from './log/logger.js';
import { installProtocol, systemProtocol } from './protocol/codec.js';
import { HEALTH_PATH, startEngineServer, WS_PATH, type EngineServer } from './web/server.js';
import type { Engine } from './engine/engine.js';
import type { Protocol } from './protocol/codec.js';

const VERSION = '0.3.0';

const log = createLogger('main');

interface ServeOptions {
  port: number;
  host: string;
  workDir?: string;
  demo?: boolean;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port number.');
  }
  return port;
}

function settingsFrom(options: ServeOptions): AppSettings {
  return {
    workDir: options.workDir ?? CONFIG.WORK_DIR,
    demo: options.demo ?? CONFIG.DEMO,
    demoStepMs: CONFIG.DEMO_STEP_MS,
    configName: CONFIG.NIXOS_CONFIG_NAME,
    installDisk: CONFIG.INSTALL_DISK,
    busCapacity: CONFIG.BUS_CAPACITY,
  };
}

function handleShutdown(server: EngineServer): void {
  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    ui.showShutdown(signal);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`Failed to close the server: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

async function serve<S, C, E>(
  createEngine: (settings: AppSettings) => Engine<S, C, E>,
  protocol: Protocol<S, C, E>,
  options: ServeOptions,
): Promise<void> {
  for (const warning of configWarnings) log.warn(warning);

  const settings = settingsFrom(options);
  const engine = createEngine(settings);
  ui.showWelcome(engine.name, VERSION, settings.demo);
  ui.startSpinner(`Starting ${engine.name} engine on ${options.host}:${options.port}`);

  const server = await startEngineServer({
    engine,
    protocol,
    host: options.host,
    port: options.port,
    version: VERSION,
  });
  const base = `${options.host}:${server.port}`;
  ui.showListening(`ws://${base}${WS_PATH}`, `http://${base}${HEALTH_PATH}`);
  handleShutdown(server);
}

function runAction<S, C, E>(
  createEngine: (settings: AppSettings) => Engine<S, C, E>,
  protocol: Protocol<S, C, E>,
): (options: ServeOptions) => Promise<void> {
  return async (options) => {
    try {
      await serve(createEngine, protocol, options);
    } catch (err) {
      ui.showError(errorMessage(err));
      process.exit(1);
    }
  };
}

function withServeOptions(command: Command): Command {
  return command
    .option('-p, --port <port>', 'Port to listen on', parsePort, CONFIG.PORT)
    .option('--host <host>', 'Address to bind to', CONFIG.HOST)
    .option('-w, --work-dir <dir>', 'Project work directory (defaults to $APPLIANCE_WORK_DIR)')
    .option('--demo', 'Simulate builds and system calls');
}

const program = new Command()
  .name('appliance-engine')
  .description('Installation and system-update orchestration engine for a NixOS appliance')
  .version(VERSION)
  .option('--log-level <level>', 'debug | info | warn | error')
  .hook('preAction', (thisCommand) => {
    const level: unknown = thisCommand.opts().logLevel;
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
      configureLogging({ level });
    } else if (level !== undefined) {
      ui.showWarning(`Ignoring unknown log level '${String(level)}'`);
    }
  });

withServeOptions(
  program.command('install').description('Serve the first-boot installer engine'),
).action(runAction(createInstallEngine, installProtocol));

withServeOptions(
  program.command('system').description('Serve the engine of an installed system (config switch, reboot)'),
).action(runAction(createSystemEngine, systemProtocol));

program.parseAsync(process.argv).catch((err: unknown) => {
  ui.showError(errorMessage(err));
  process.exit(1);
});
