import { Command } from 'commander';

import { CONFIG_PATH, VERSION, loadConfig } from './config.js';
import type { BuoytermConfig, FeedKind } from './types.js';

export interface ViewOptions {
  url?: string;
  mouse: boolean;
  config?: string;
}

export type ViewRunner = (kind: FeedKind, config: BuoytermConfig) => Promise<void>;

export interface CliIO {
  log: (message: string) => void;
}

/**
 * Apply command-line overrides on top of the loaded configuration.
 */
export function resolveConfig(kind: FeedKind, options: ViewOptions): BuoytermConfig {
  const config = loadConfig(options.config ?? CONFIG_PATH);
  const feeds = { ...config.feeds };
  if (options.url) {
    if (kind === 'observations') {
      feeds.observationsUrl = options.url;
    } else {
      feeds.stationsUrl = options.url;
    }
  }
  return { ...config, feeds, mouse: config.mouse && options.mouse };
}

export function createProgram(run: ViewRunner, io: CliIO = { log: message => console.log(message) }): Command {
  const program = new Command();

  program.name('buoyterm').description('Browse NDBC marine buoy data in the terminal').version(VERSION);

  const addViewOptions = (command: Command): Command =>
    command
      .option('-u, --url <url>', 'Fetch the feed from this URL instead')
      .option('--no-mouse', 'Do not capture the mouse')
      .option('-c, --config <path>', 'Config file', CONFIG_PATH);

  // observations command (default)
  addViewOptions(
    program
      .command('observations', { isDefault: true })
      .description('Latest observations from every reporting buoy')
  ).action(async (options: ViewOptions) => {
    await run('observations', resolveConfig('observations', options));
  });

  // stations command
  addViewOptions(
    program
      .command('stations')
      .description('Active stations list')
  ).action(async (options: ViewOptions) => {
    await run('stations', resolveConfig('stations', options));
  });

  // config command
  program
    .command('config')
    .description('Show the effective configuration')
    .option('-c, --config <path>', 'Config file', CONFIG_PATH)
    .action((options: { config: string }) => {
      const config = loadConfig(options.config);
      io.log(`Config file: ${options.config}`);
      io.log(`Observations feed: ${config.feeds.observationsUrl}`);
      io.log(`Stations feed: ${config.feeds.stationsUrl}`);
      io.log(`Request timeout: ${config.requestTimeoutMs}ms`);
      io.log(`Mouse capture: ${config.mouse ? 'on' : 'off'}`);
    });

  return program;
}
