#!/usr/bin/env node
import { loadConfig } from "./config/config";
import { createLogger } from "./infra/logger";
import { ConsolePrompter } from "./infra/consolePrompter";
import { InteractiveLoop } from "./cli/interactiveLoop";
import { QuoteService } from "./services/quoteService";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);
  const prompter = new ConsolePrompter();
  const loop = new InteractiveLoop(prompter, new QuoteService(logger), logger);

  try {
    const quoted = await loop.run();
    logger.info('Input closed', { quoted });
  } finally {
    prompter.close();
  }
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
