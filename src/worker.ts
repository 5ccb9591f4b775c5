/**
 * Background worker process for reconciliation jobs
 *
 * Run separately from API server: `npm run worker`
 *
 * Responsibilities:
 * - Consume reconcile-entry jobs and reconcile each entry in its own transaction
 * - Run the scheduled sweep-tombstones maintenance job
 */

import 'dotenv/config';
import { getConfig } from './config/index.js';
import { initTracing, shutdownTracing } from './config/tracing.js';
import {
  getQueue,
  QUEUE_NAMES,
  runReconcileJobs,
  scheduleSweep,
  stopQueue,
  type ReconcileEntryJobData,
  type SweepTombstonesJobData,
} from './queue/archiveQueue.js';
import { getArchiveServices } from './services/archiveServices.js';

/**
 * Register job handlers and start worker
 */
async function startWorker() {
  console.log('🚀 Starting worker process...');

  try {
    const config = getConfig();
    initTracing(config);

    const services = await getArchiveServices();
    const queue = await getQueue();

    // One job per fetch: a throwing batch handler fails every job in the batch
    for (let i = 0; i < config.RECONCILE_CONCURRENCY; i++) {
      await queue.work<ReconcileEntryJobData>(
        QUEUE_NAMES.RECONCILE_ENTRY,
        { batchSize: 1, pollingIntervalSeconds: 2 },
        (jobs) => runReconcileJobs(services.reconciler, jobs)
      );
    }

    await queue.work<SweepTombstonesJobData>(QUEUE_NAMES.SWEEP_TOMBSTONES, { batchSize: 1 }, async (jobs) => {
      for (const job of jobs) {
        const report = await services.sweeper.sweep({
          graceDays: job.data.graceDays ?? config.TOMBSTONE_GRACE_DAYS,
          orphanMinAgeMinutes: 10,
        });
        console.log(`✅ [Job ${job.id}] Sweep purged ${report.purged.length} tombstone(s)`);
      }
    });

    await scheduleSweep(config.SWEEP_CRON);

    console.log('✅ Worker registered for queues:', QUEUE_NAMES.RECONCILE_ENTRY, QUEUE_NAMES.SWEEP_TOMBSTONES);
    console.log('👂 Listening for jobs...\n');
  } catch (error) {
    console.error('❌ Failed to start worker:', error);
    process.exit(1);
  }
}

/**
 * Graceful shutdown handler
 */
async function shutdown() {
  console.log('\n🛑 Shutting down worker...');

  try {
    const services = await getArchiveServices();
    await stopQueue();
    await services.close();
    await shutdownTracing();
    console.log('✅ Worker shutdown complete');
    process.exit(0);
  } catch (error) {
    console.error('❌ Error during shutdown:', error);
    process.exit(1);
  }
}

// Handle shutdown signals
process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

process.on('unhandledRejection', (reason) => {
  console.error('💥 Unhandled rejection:', reason);
  void shutdown();
});

void startWorker();
