import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { DATA_KINDS, isDataKind, type DataKind } from '../youtube/types.js';
import { createEtlContext } from './context.js';

async function runEtl(target: string) {
  const kinds: readonly DataKind[] = target === 'all' ? DATA_KINDS : isDataKind(target) ? [target] : [];
  if (kinds.length === 0) {
    logger.error(`Unknown data kind: ${target}`);
    process.exit(1);
  }

  const { db, ledger, orchestrator } = createEtlContext();
  try {
    ledger.recoverStaleRuns(config.staleRunMinutes);
    const summary = await orchestrator.runDay(kinds);

    for (const run of summary.runs) {
      const quality = run.quality === 'flagged' ? ` [flagged: ${run.qualityReasons.join('; ')}]` : '';
      logger.info(`  ${run.channelId} ${run.kind}: ${run.status}${run.reason ? ` (${run.reason})` : ''}${quality}`);
    }
    if (summary.haltedByQuota) {
      logger.warn(`Stopped early: quota exhausted (${summary.quotaReason ?? 'unknown'})`);
    }
  } finally {
    db.close();
  }
}

// CLI entry point
const target = process.argv[2] ?? 'all';

runEtl(target)
  .then(() => {
    logger.info('ETL run completed');
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error(`ETL run failed: ${String(error)}`);
    process.exit(1);
  });
