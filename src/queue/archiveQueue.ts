/**
 * pg-boss queue configuration for background reconciliation
 *
 * Uses a dedicated PostgreSQL database for job persistence. Two queues:
 * - reconcile-entry: one entry descriptor per job
 * - sweep-tombstones: scheduled maintenance sweep
 */

import PgBoss from 'pg-boss';
import { getConfig, queueDatabaseUrl } from '../config/index.js';
import type { EntryDescriptorInput } from '../schemas/entryDescriptor.js';
import type { EntryReconciler } from '../services/entryReconciler.js';
import type { ReconcileMode } from '../services/relationshipProcessors/index.js';

// Queue names
export const QUEUE_NAMES = {
  RECONCILE_ENTRY: 'reconcile-entry',
  SWEEP_TOMBSTONES: 'sweep-tombstones',
} as const;

// Job data types
export interface ReconcileEntryJobData {
  descriptor: EntryDescriptorInput;
  mode: ReconcileMode;
}

export interface SweepTombstonesJobData {
  graceDays?: number;
}

// Singleton instance
let queueInstance: PgBoss | null = null;

/**
 * Get or create the queue instance
 */
export async function getQueue(): Promise<PgBoss> {
  if (!queueInstance) {
    const config = getConfig();

    console.log('🔧 Initializing pg-boss with dedicated database connection...');

    const boss = new PgBoss({
      connectionString: queueDatabaseUrl(config),
      schema: 'pgboss',

      // Connection pool
      max: 3,
      application_name: 'journal-archive',

      // Cron schedules drive the maintenance sweep
      schedule: true,
      supervise: true,
      maintenanceIntervalSeconds: 300,
    });

    boss.on('error', (error: Error) => {
      // pg-boss reconnects on its own
      if ('code' in error && error.code === 'ETIMEDOUT') {
        console.warn('[pg-boss] Connection timeout - will retry automatically');
      } else {
        console.error('[pg-boss] Queue error:', error);
      }
    });

    queueInstance = boss;
    await queueInstance.start();

    await queueInstance.createQueue(QUEUE_NAMES.RECONCILE_ENTRY, {
      name: QUEUE_NAMES.RECONCILE_ENTRY,
      retryLimit: 3,
      retryDelay: 60,
      retryBackoff: true,
      expireInSeconds: 3600,
    });

    await queueInstance.createQueue(QUEUE_NAMES.SWEEP_TOMBSTONES, {
      name: QUEUE_NAMES.SWEEP_TOMBSTONES,
      policy: 'singleton',
      retryLimit: 1,
      expireInSeconds: 3600,
    });

    console.log('✅ pg-boss queues started (reconcile entry, sweep tombstones)');
  }
  return queueInstance;
}

/**
 * Stop the queue (for graceful shutdown)
 */
export async function stopQueue(): Promise<void> {
  if (queueInstance) {
    await queueInstance.stop();
    queueInstance = null;
    console.log('✅ pg-boss queue stopped');
  }
}

/**
 * Enqueue one entry descriptor for reconciliation
 */
export async function enqueueEntryReconciliation(
  descriptor: EntryDescriptorInput,
  mode: ReconcileMode = 'replace'
): Promise<string> {
  try {
    const queue = await getQueue();
    const data: ReconcileEntryJobData = { descriptor, mode };

    const jobId = await queue.send(QUEUE_NAMES.RECONCILE_ENTRY, data);
    if (!jobId) {
      throw new Error('pg-boss returned null jobId - queue may not be properly initialized');
    }

    console.log(`📝 Enqueued reconciliation for entry ${descriptor.date} (job: ${jobId})`);
    return jobId;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error('[pg-boss] Failed to enqueue job:', errorMessage);
    throw new Error(`Failed to enqueue entry reconciliation job: ${errorMessage}`);
  }
}

/**
 * Register the cron schedule of the maintenance sweep
 */
export async function scheduleSweep(cron: string, data: SweepTombstonesJobData = {}): Promise<void> {
  const queue = await getQueue();
  await queue.schedule(QUEUE_NAMES.SWEEP_TOMBSTONES, cron, data);
  console.log(`⏰ Scheduled ${QUEUE_NAMES.SWEEP_TOMBSTONES} (${cron})`);
}

/**
 * Handler of the reconcile-entry queue. The worker fetches one job per call,
 * so a thrown error fails (and retries) only the entry that broke.
 */
export async function runReconcileJobs(
  reconciler: Pick<EntryReconciler, 'reconcile'>,
  jobs: Array<{ id: string; data: ReconcileEntryJobData }>
): Promise<void> {
  for (const job of jobs) {
    const { descriptor, mode } = job.data;
    console.log(`\n[Job ${job.id}] Reconciling entry ${descriptor.date}...`);

    try {
      const report = await reconciler.reconcile(descriptor, mode);
      console.log(`✅ [Job ${job.id}] Entry ${report.date}: ${report.totalChanges} change(s)`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error(`❌ [Job ${job.id}] Failed to reconcile entry ${descriptor.date}:`, errorMessage);

      // Rethrow to trigger pg-boss retry logic
      throw error;
    }
  }
}
