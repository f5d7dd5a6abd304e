import { config } from './config.js';
import { logger } from './core/logger.js';
import { createEtlContext } from './etl/context.js';
import { startServer } from './web/server.js';
import { DailyScheduler } from './scheduler/jobs.js';

async function main() {
  logger.info('='.repeat(50));
  logger.info('Channel Engagement ETL');
  logger.info('='.repeat(50));

  const { db, channels, ledger, orchestrator } = createEtlContext();
  logger.info(`Loaded ${channels.length} channel(s) from ${config.paths.channels}`);

  // Runs a crash left in `running` are failed before anything new is admitted
  const recovered = ledger.recoverStaleRuns(config.staleRunMinutes);
  if (recovered.length > 0) {
    logger.warn(`Marked ${recovered.length} stale run(s) as failed`);
  }

  const scheduler = new DailyScheduler({
    cron: config.cron,
    staleRunMinutes: config.staleRunMinutes,
    ledger,
    orchestrator,
    onFatal: error => {
      logger.error(`Shutting down on schema violation: ${error.message}`);
      db.close();
      process.exit(1);
    },
  });

  const server = startServer({
    db,
    suspicionThreshold: config.authenticity.suspicionThreshold,
    schedule: () => scheduler.info(),
  });
  scheduler.start();

  logger.info('');
  logger.info('✅ System is running!');
  logger.info('');
  logger.info(`Status API: http://localhost:${config.port}/api/status`);
  logger.info('');
  logger.info('Manual ETL commands:');
  logger.info('  npm run etl:videos');
  logger.info('  npm run etl:metrics');
  logger.info('  npm run etl:comments');
  logger.info('  npm run etl');
  logger.info('');

  // Handle graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    scheduler.stop();
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(error => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
