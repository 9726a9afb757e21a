#!/usr/bin/env node
/**
 * Scheduled batch entry point
 * Reads configuration from the environment, runs the pipeline once and exits
 */
import { runPipeline } from './services/scraper-orchestrator.js';
import type { ScraperConfig } from './types/index.js';
import { loadConfig } from './utils/config.js';
import { createRunLogger, generateRunId, getRootLogger, safeLogObject } from './utils/logger.js';

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: ScraperConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    getRootLogger().fatal({ err: error }, 'Configuration failed');
    return 1;
  }

  const log = createRunLogger({ runId: generateRunId(), url: config.source.url }, config.logLevel);
  log.debug({ config: safeLogObject(config) }, 'Configuration loaded');

  try {
    const result = await runPipeline(config, log);
    log.info({ status: result.status }, 'Run finished');
    return 0;
  } catch (error) {
    log.fatal({ err: error }, 'Run failed');
    return 1;
  }
}

if (require.main === module) {
  void main().then((exitCode) => {
    process.exitCode = exitCode;
  });
}
