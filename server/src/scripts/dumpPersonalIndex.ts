#!/usr/bin/env node
import fs from 'node:fs/promises';
import process from 'node:process';
import { decodeRequestData } from '../service/dataFetcher';
import { calculatePersonalIndex } from '../service/indexCalculator';
import { toResultPayload } from '../service/resultReporter';

const getArgValue = (flag: string): string | undefined => {
  const index = process.argv.indexOf(flag);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const printUsageAndExit = (message?: string, code = 1): never => {
  if (message) console.error(message);
  console.info(
    'Usage: npm run calculation:dump -- --file <ASYNC_DATA_JSON> [--id <REQUEST_ID>]'
  );
  process.exit(code);
};

const main = async () => {
  const file = getArgValue('--file') ?? printUsageAndExit('--file is required');
  const requestId = getArgValue('--id') ?? 'local';

  const raw = await fs.readFile(file, 'utf8');
  const data = decodeRequestData(JSON.parse(raw));
  const calculation = calculatePersonalIndex(requestId, data);

  console.info('=== PERSONAL CPI BREAKDOWN ===');
  console.info(`comparisonDate: ${data.comparisonDate ?? '-'}`);
  console.info(`categories: ${data.categories.length}`);
  console.info(`totalSpent: ${calculation.totalSpent}`);
  for (const contribution of calculation.contributions) {
    console.info(
      `- ${contribution.categoryId}: weight=${contribution.weight.toFixed(4)}, change=${contribution.change.toFixed(4)}`
    );
  }
  if (calculation.failureReason) {
    console.info(`no result: ${calculation.failureReason}`);
  }
  console.info('==============================');
  console.info(JSON.stringify(toResultPayload(calculation.outcome), null, 2));
};

main().catch((error: unknown) => {
  console.error('[calculation:dump] failed:', error);
  process.exit(1);
});
