/**
 * avrodeck - browse registry schemas, publish and consume Avro messages
 */

import { Command } from 'commander';
import { runApp } from './app.js';
import { defaultConfigPath, defaultLogPath } from './config.js';
import { ConfigError } from './errors.js';

interface CliOptions {
  selectConfig?: boolean;
  config: string;
  logFile: string;
  color: boolean;
}

const program = new Command();

program
  .name('avrodeck')
  .description('Terminal client for Avro schemas in a schema registry and messages on Kafka')
  .version('0.1.0')
  .option('-s, --select-config', 'choose or manage configuration profiles at startup')
  .option('-c, --config <path>', 'configuration file', defaultConfigPath())
  .option('--log-file <path>', 'log file', defaultLogPath())
  .option('--no-color', 'disable colored output')
  .action(async (options: CliOptions) => {
    try {
      await runApp({
        configPath: options.config,
        logFile: options.logFile,
        selectConfig: options.selectConfig ?? false,
        noColor: !options.color,
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
      } else {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      }
      process.exit(1);
    }
  });

await program.parseAsync();
