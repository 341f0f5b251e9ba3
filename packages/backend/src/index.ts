import 'dotenv/config';
import { buildApp } from './app.js';
import { type AnalysisConfig, loadAnalysisConfig } from './lib/config/analysis.js';
import { logger, resolveLogLevel } from './lib/logger.js';

// Invalid thresholds are fatal before the server accepts any request
function loadConfigOrExit(): AnalysisConfig {
  try {
    return loadAnalysisConfig();
  } catch (err) {
    logger.fatal(err);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const fastify = await buildApp({
  config,
  logger: { level: resolveLogLevel() },
});

fastify.log.info(
  { amountUnit: config.amountUnit, excessThresholdPercent: config.excessThresholdPercent },
  'Analysis config loaded'
);

const start = async () => {
  try {
    const port = parseInt(process.env.PORT || '3000', 10);
    const host = process.env.HOST || '0.0.0.0';
    await fastify.listen({ port, host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
