/**
 * coaching-sim - health-coaching engagement simulator
 *
 * Entry point: load config, run one simulation, write the event log and
 * chat transcript.
 */

import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { ConfigurationError, errorMessage } from './core/errors.js';
import { createLogger } from './core/logger.js';
import { SeededRandom, generateSeed } from './core/random.js';
import { runSimulation } from './core/simulation.js';
import { createCollaborators } from './llm/index.js';
import { writeRunOutputs } from './storage/output-writer.js';

async function main(): Promise<void> {
  const config = await loadConfig(process.env['CONFIG_PATH']);

  const logger = createLogger({
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  const seed = config.simulation.seed ?? generateSeed();
  const rng = new SeededRandom(seed);
  const collaborators = createCollaborators(config, logger);

  logger.info(
    {
      seed,
      horizonDays: config.simulation.horizonDays,
      llm: collaborators ? config.llm.provider : 'disabled',
    },
    'coaching-sim starting'
  );

  const result = await runSimulation({
    settings: config,
    rng,
    logger,
    collaborators,
    seed,
  });

  const paths = await writeRunOutputs(result.state.eventLog, {
    outputDir: config.paths.output,
    logger,
  });

  const messages = result.state.eventLog.ofType('MESSAGE').length;
  const errors = result.state.eventLog.ofType('ERROR').length;
  logger.info(
    {
      mode: result.mode,
      events: result.state.eventLog.length,
      messages,
      errors,
      ...paths,
    },
    'Simulation complete'
  );
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    // eslint-disable-next-line no-console
    console.error(`Configuration error: ${error.message}`);
  } else {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', errorMessage(error));
  }
  process.exitCode = 1;
});
