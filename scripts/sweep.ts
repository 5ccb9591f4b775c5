#!/usr/bin/env tsx
/**
 * Run the tombstone sweep once against the configured store
 * Usage: tsx scripts/sweep.ts [graceDays]
 */

import { getConfig } from '../src/config/index.js';
import { getArchiveServices } from '../src/services/archiveServices.js';

async function main() {
  const config = getConfig();
  const graceArg = process.argv[2];
  const graceDays = graceArg === undefined ? config.TOMBSTONE_GRACE_DAYS : Number(graceArg);

  if (!Number.isInteger(graceDays) || graceDays < 0) {
    console.error('❌ Usage: tsx scripts/sweep.ts [graceDays]');
    process.exit(1);
  }

  const services = await getArchiveServices();
  try {
    const report = await services.sweeper.sweep({ graceDays });
    console.log(JSON.stringify(report, null, 2));

    const integrity = await services.checkIntegrity();
    if (!integrity.ok) {
      for (const issue of integrity.issues) {
        console.log(`   ⚠️  ${issue.type}: ${issue.message}`);
      }
    }
    await services.close();
    process.exit(0);
  } catch (error) {
    console.error('❌ Sweep failed:', error);
    await services.close();
    process.exit(1);
  }
}

void main();
