import { createApp } from './app';
import { loadConfig } from './config/env';
import { createLogger } from './config/logger';
import { OpenAiScreeningLlm } from './llm/client';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

if (!config.llm.apiKey) {
  logger.warn('OPENAI_API_KEY is not set; screening jobs will fail until it is configured.');
}

const app = createApp({
  config,
  logger,
  llm: new OpenAiScreeningLlm(config.llm, logger),
});

app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`, { model: config.llm.model });
});

export default app;
