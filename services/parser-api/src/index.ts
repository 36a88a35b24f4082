/**
 * Parser API Service
 *
 * Starts the HTTP boundary with the parser wired from configuration.
 */

import {
  logger,
  config,
  createJobNoticeParser,
  getDefaultPatternTable,
} from '@jobnotice/shared';
import { createApp } from './app';
import { PdfjsTextExtractor } from './lib/pdf';

// Load and validate the pattern table before accepting uploads
getDefaultPatternTable();

const parser = createJobNoticeParser();

if (!parser.modelConfigured) {
  logger.warn('OPENAI_API_KEY not set, every document will use the regex parser');
}

const app = createApp({ parser, textExtractor: new PdfjsTextExtractor() });

const server = app.listen(config.port, () => {
  logger.info(`${config.projectName} API started`, {
    port: config.port,
    model: parser.modelConfigured ? config.llmModel : null,
    debug: config.debug,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
