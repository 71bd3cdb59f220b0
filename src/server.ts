import { validateConfig } from './config/index.js';
import { createApp } from './app.js';
import { TranslationClient } from './services/translator.js';
import { TelegramApi } from './services/telegram.js';
import { createUpdateHandler } from './services/updateHandler.js';
import { startPolling } from './services/poller.js';

// Validate required configuration on startup
const config = validateConfig();

const translator = new TranslationClient({
  apiUrl: config.translation.apiUrl,
  apiKey: config.translation.apiKey,
  model: config.translation.model,
  timeoutMs: config.translation.timeoutMs,
});

const telegram = new TelegramApi({
  token: config.telegram.botToken,
  baseUrl: config.telegram.apiBaseUrl,
});

const handleUpdate = createUpdateHandler({
  bot: telegram,
  translator,
  defaultSource: config.languages.defaultSource,
  defaultTarget: config.languages.defaultTarget,
  botUsername: config.telegram.botUsername,
});

const app = createApp({
  translator,
  handleUpdate,
  defaultSource: config.languages.defaultSource,
  defaultTarget: config.languages.defaultTarget,
  webhookSecret: config.telegram.webhookSecret,
  maxTextLength: config.validation.maxTextLength,
});

const shutdown = new AbortController();

async function startUpdates(): Promise<void> {
  if (config.telegram.webhookUrl) {
    await telegram.setWebhook(config.telegram.webhookUrl, config.telegram.webhookSecret);
    console.log(`Telegram webhook registered at ${config.telegram.webhookUrl}`);
    return;
  }

  // getUpdates refuses to run while a webhook is registered
  await telegram.deleteWebhook();
  await startPolling(telegram, handleUpdate, { signal: shutdown.signal });
}

const server = app.listen(config.port, () => {
  console.log(`Server listening at http://localhost:${config.port}`);
  console.log(`Endpoint: ${translator.endpoint.href} (model ${config.translation.model})`);

  startUpdates().catch(error => {
    console.error('Failed to start Telegram updates:', error);
    process.exit(1);
  });
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.log(`Received ${signal}, shutting down`);
    shutdown.abort();
    server.close();
  });
}
