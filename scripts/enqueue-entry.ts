#!/usr/bin/env tsx
/**
 * Manual script to enqueue entry descriptors for reconciliation
 * Usage: tsx scripts/enqueue-entry.ts <descriptor.json> [replace|merge]
 *
 * The file holds one descriptor object or an array of them.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { enqueueEntryReconciliation, stopQueue } from '../src/queue/archiveQueue.js';
import { entryDescriptorSchema } from '../src/schemas/entryDescriptor.js';
import { reconcileModeSchema } from '../src/schemas/http.js';

async function main() {
  const [file, modeArg] = process.argv.slice(2);

  if (!file) {
    console.error('❌ Usage: tsx scripts/enqueue-entry.ts <descriptor.json> [replace|merge]');
    process.exit(1);
  }

  try {
    const mode = reconcileModeSchema.parse(modeArg);
    const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
    // Validated here so a malformed file fails before anything is queued
    const descriptors = z.array(entryDescriptorSchema).parse(Array.isArray(raw) ? raw : [raw]);

    for (const descriptor of descriptors) {
      const jobId = await enqueueEntryReconciliation(descriptor, mode);
      console.log(`   ${descriptor.date} → job ${jobId}`);
    }

    console.log(`✅ ${descriptors.length} job(s) enqueued`);
    console.log(`\nYour local worker should pick these up shortly...`);
    await stopQueue();
    process.exit(0);
  } catch (error) {
    console.error('❌ Failed to enqueue:', error);
    await stopQueue();
    process.exit(1);
  }
}

void main();
