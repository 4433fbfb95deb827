import axios from 'axios';
import { z } from 'zod';

/**
 * Concurrency Check Script
 *
 * Fires many GET /v1/queue/next requests at a running server at once and
 * verifies that no item and no token is handed out twice, then skips every
 * assigned item with its token. Run against a server whose queue holds at
 * least as many pending images as the number of requests, or fewer if some
 * requests are expected to come back empty.
 *
 * NOTE: skipping marks the items DONE; point it at a scratch database.
 */

// Configuration
const BASE_URL = process.env['API_BASE_URL'] || 'http://localhost:5000';
const CONCURRENT_REQUESTS = Number(process.env['CONCURRENT_REQUESTS'] || 50);

const nextResponseSchema = z.object({
  data: z.discriminatedUnion('status', [
    z.object({
      status: z.literal('assigned'),
      item: z.object({ id: z.number(), name: z.string() }),
      token: z.string(),
      expiresAt: z.string(),
    }),
    z.object({ status: z.literal('empty') }),
  ]),
});

type Assignment = { itemId: number; name: string; token: string };

interface CheckResult {
  assigned: Assignment[];
  empty: number;
  errors: Array<{ status?: number; message: string }>;
}

/**
 * Requests the next item
 */
async function requestNext(): Promise<Assignment | 'empty'> {
  const response = await axios.get(`${BASE_URL}/v1/queue/next`, {
    timeout: 10000,
    validateStatus: () => true,
  });

  if (response.status !== 200) {
    throw new Error(`next returned ${response.status}`);
  }

  const { data } = nextResponseSchema.parse(response.data);
  if (data.status === 'empty') {
    return 'empty';
  }
  return { itemId: data.item.id, name: data.item.name, token: data.token };
}

/**
 * Skips an assigned item so the check leaves no live leases behind
 */
async function skipAssignment(assignment: Assignment): Promise<number> {
  const response = await axios.post(
    `${BASE_URL}/v1/queue/skip`,
    { item_id: assignment.itemId, token: assignment.token },
    { timeout: 10000, validateStatus: () => true }
  );
  return response.status;
}

/**
 * Checks if the server is running
 */
async function checkServerHealth(): Promise<void> {
  try {
    await axios.get(`${BASE_URL}/health`, { timeout: 5000 });
    console.log(`✓ Server is healthy at ${BASE_URL}`);
  } catch (error) {
    console.error(`❌ Server is not running at ${BASE_URL}`);
    console.error(`   ${axios.isAxiosError(error) ? error.message : String(error)}`);
    console.error('   Please start the server with: npm run dev');
    process.exit(1);
  }
}

function duplicates(values: Array<string | number>): Array<string | number> {
  const seen = new Set<string | number>();
  const repeated = new Set<string | number>();
  for (const value of values) {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  }
  return [...repeated];
}

/**
 * Main check execution
 */
async function runConcurrencyCheck(): Promise<void> {
  console.log('╔════════════════════════════════════════════════════════════╗');
  console.log('║  Concurrency Check - Label Queue API                       ║');
  console.log('╚════════════════════════════════════════════════════════════╝\n');

  console.log(`Configuration:`);
  console.log(`  Base URL:            ${BASE_URL}`);
  console.log(`  Concurrent Requests: ${CONCURRENT_REQUESTS}\n`);

  console.log('Step 1: Checking server health...');
  await checkServerHealth();
  console.log();

  console.log(`Step 2: Making ${CONCURRENT_REQUESTS} concurrent next requests...`);
  const startTime = Date.now();
  const settled = await Promise.allSettled(
    Array.from({ length: CONCURRENT_REQUESTS }, () => requestNext())
  );
  const duration = Date.now() - startTime;
  console.log(`✓ All requests completed in ${duration}ms\n`);

  const result: CheckResult = { assigned: [], empty: 0, errors: [] };
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      const reason: unknown = outcome.reason;
      result.errors.push({
        status: axios.isAxiosError(reason) ? reason.response?.status : undefined,
        message: reason instanceof Error ? reason.message : String(reason),
      });
    } else if (outcome.value === 'empty') {
      result.empty++;
    } else {
      result.assigned.push(outcome.value);
    }
  }

  console.log('📈 Results:');
  console.log(`   ✓ Assigned:     ${result.assigned.length}`);
  console.log(`   ✓ Empty:        ${result.empty}`);
  console.log(`   ✗ Errors:       ${result.errors.length}`);
  result.errors.slice(0, 10).forEach((error, idx) => {
    console.log(`   ${idx + 1}. Status ${error.status ?? 'n/a'}: ${error.message}`);
  });

  console.log('\nStep 3: Checking for double assignment...');
  const repeatedIds = duplicates(result.assigned.map((a) => a.itemId));
  const repeatedTokens = duplicates(result.assigned.map((a) => a.token));

  console.log('\nStep 4: Skipping assigned items...');
  const skipStatuses = await Promise.all(result.assigned.map((a) => skipAssignment(a)));
  const failedSkips = skipStatuses.filter((status) => status !== 200).length;
  console.log(`✓ Skipped ${skipStatuses.length - failedSkips} items, ${failedSkips} refused`);

  const passed =
    repeatedIds.length === 0 && repeatedTokens.length === 0 && result.errors.length === 0 && failedSkips === 0;

  if (passed) {
    console.log('\n╔════════════════════════════════════════════════════════════╗');
    console.log('║  ✅ CONCURRENCY CHECK PASSED                               ║');
    console.log('╚════════════════════════════════════════════════════════════╝\n');
    console.log(`✓ ${result.assigned.length} distinct items, ${result.assigned.length} distinct tokens`);
    process.exit(0);
  }

  console.log('\n╔════════════════════════════════════════════════════════════╗');
  console.log('║  ❌ CONCURRENCY CHECK FAILED                               ║');
  console.log('╚════════════════════════════════════════════════════════════╝\n');
  if (repeatedIds.length > 0) {
    console.log(`❌ CRITICAL: items handed out more than once: ${repeatedIds.join(', ')}`);
  }
  if (repeatedTokens.length > 0) {
    console.log(`❌ CRITICAL: tokens issued more than once: ${repeatedTokens.length}`);
  }
  if (result.errors.length > 0) {
    console.log(`❌ ${result.errors.length} requests failed outright`);
  }
  if (failedSkips > 0) {
    console.log(`❌ ${failedSkips} skips were refused with a fresh token`);
  }
  process.exit(1);
}

runConcurrencyCheck().catch((error: unknown) => {
  console.error('\n❌ Check execution failed:');
  console.error(error);
  process.exit(1);
});
