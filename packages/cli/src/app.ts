/**
 * Wires configuration, gateways, the runtime and the terminal together.
 */

import { Runtime, type Gateways } from '@avrodeck/engine';
import { createLogger, type Logger } from '@avrodeck/logger';
import { systemClipboard } from './clipboard.js';
import { configDir, ensureConfigFile, resolveConfig, saveConfigFile, type AppConfig } from './config.js';
import { FileDraftStore } from './drafts/store.js';
import { ExternalEditor } from './editor/external.js';
import { createKafka } from './kafka/connection.js';
import { KafkaConsumerGateway } from './kafka/consumer.js';
import { KafkaProducer } from './kafka/producer.js';
import { unavailableConsumer, unavailableProducer } from './kafka/unavailable.js';
import { RegistryClient } from './registry/client.js';
import { selectProfile } from './ui/profile-selector.js';
import { render, type View } from './ui/render.js';
import { Terminal } from './ui/terminal.js';
import { createTheme, type Theme } from './ui/theme.js';

export interface AppOptions {
  configPath: string;
  logFile: string;
  selectConfig: boolean;
  noColor: boolean;
}

export async function runApp(options: AppOptions): Promise<void> {
  const file = await ensureConfigFile(options.configPath);
  const theme = createTheme({ noColor: options.noColor });
  const terminal = new Terminal();

  terminal.open();
  try {
    const selection = options.selectConfig
      ? await selectProfile(file, terminal, theme, (next) => saveConfigFile(options.configPath, next))
      : { file, id: null };
    const config = resolveConfig(selection.file, selection.id);
    const logger = createLogger({ filePath: options.logFile, silent: true, environment: 'production' }).child({
      profile: config.profileName,
    });

    try {
      await runSession(config, terminal, theme, logger);
    } finally {
      await logger.flush();
    }
  } finally {
    terminal.close();
  }
}

async function runSession(config: AppConfig, terminal: Terminal, theme: Theme, logger: Logger): Promise<void> {
  const kafka = config.kafka ? createKafka(config.kafka, logger.child({ component: 'kafka' })) : null;
  const producer = kafka ? new KafkaProducer(kafka) : null;
  const consumer = kafka ? new KafkaConsumerGateway(kafka) : null;

  const gateways: Gateways = {
    registry: new RegistryClient(config.registry),
    producer: producer ?? unavailableProducer,
    consumer: consumer ?? unavailableConsumer,
    drafts: new FileDraftStore({ baseDir: configDir() }),
    editor: new ExternalEditor(terminal),
    clipboard: systemClipboard,
  };

  const view = (): View => ({
    ...terminal.size,
    theme,
    profileName: config.profileName,
    brokerConfigured: kafka !== null,
  });

  const runtime = new Runtime({
    gateways,
    logger,
    onChange: (session) => terminal.draw(render(session, view())),
  });

  terminal.onKey((key) => runtime.dispatch({ type: 'KEY', key }));
  terminal.onResize(() => terminal.draw(render(runtime.state, view())));

  await runtime.start();
  try {
    await runtime.finished;
  } finally {
    await runtime.stop();
    await Promise.all([producer?.disconnect(), consumer?.closeAll()]);
  }
}
