/**
 * Manual verification script for platform credentials
 *
 * Checks, against the live platform configured in .env:
 * 1. The token and org resolve (an empty files query succeeds)
 * 2. Collections can be listed
 * 3. The first collection's fields can be read and decoded
 *
 * Nothing is written to the platform.
 *
 * Run: npm run build && node dist/scripts/verify-connection.js
 */

import dotenv from 'dotenv';
import { createPlatformContext } from '../src/services/platform/context.js';
import { fetchCurrentFields } from '../src/services/labeling/schema-reconciler.js';
import { listCollectionIds } from '../src/services/labeling/snapshot.js';
import { errorMessage } from '../src/utils/logger.js';

dotenv.config();

// Result tracking
let passed = 0;
let failed = 0;
const errors: string[] = [];

async function check<T>(message: string, fn: () => Promise<T>): Promise<T | null> {
  try {
    const value = await fn();
    passed++;
    console.log(`  ✓ ${message}`);
    return value;
  } catch (error) {
    failed++;
    errors.push(`${message}: ${errorMessage(error)}`);
    console.error(`  ✗ ${message}: ${errorMessage(error)}`);
    return null;
  }
}

async function main(): Promise<void> {
  const ctx = createPlatformContext({ tag: 'verify', verbose: process.argv.includes('--verbose') });
  console.log(`Verifying ${ctx.client.apiUrl}\n`);

  await check('Credentials accepted', () => ctx.client.ping());

  const collectionIds = await check('Collections listed', () => listCollectionIds(ctx.client));
  if (collectionIds !== null) {
    console.log(`    ${collectionIds.length} collection(s)`);
    const first = collectionIds[0];
    if (first !== undefined) {
      const schema = await check(`Fields of ${first} decoded`, () => fetchCurrentFields(ctx.client, first));
      if (schema !== null) {
        console.log(`    ${Object.keys(schema.fields).length} field(s)`);
      }
    }
  }

  console.log('\n═══════════════════════════════════════');
  console.log(`  Passed: ${passed}`);
  console.log(`  Failed: ${failed}`);
  console.log('═══════════════════════════════════════');

  if (failed > 0) {
    for (const e of errors) console.error(`  - ${e}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Verification failed with error:', errorMessage(error));
  process.exit(1);
});
