/**
 * Generate the project status report: charts, resolved-items workbook and deck.
 * Configuration comes from the environment (.env is loaded if present).
 *
 * Exit codes: 0 all artifacts written, 1 some artifacts failed, 2 run aborted.
 */

import dotenv from 'dotenv';
import { loadReportConfig } from '../src/config';
import { runReport } from '../src/services/reportPipeline';
import { formatError } from '../src/utils/errorUtils';
import { logger } from '../src/utils/logger';

dotenv.config();

async function main(): Promise<number> {
  const config = loadReportConfig();
  const summary = await runReport(config);

  console.log('');
  console.log('📋 Report Summary');
  console.log('─'.repeat(50));
  for (const artifact of summary.artifacts) {
    console.log(`✅ ${artifact.name}: ${artifact.outputPath}`);
  }
  for (const failure of summary.failures) {
    console.log(`❌ ${failure.name}: ${failure.message}`);
  }
  if (summary.warnings.length > 0) {
    console.log('');
    console.log(`⚠️  ${summary.warnings.length} unmapped labels (defaults used)`);
  }
  if (summary.excluded.length > 0) {
    console.log(`⚠️  ${summary.excluded.length} records skipped or left off the scatter plot`);
  }
  console.log('─'.repeat(50));

  return summary.failures.length === 0 ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const details = formatError(error);
    logger.critical(`Report aborted: ${details.message}`, {
      context: 'generate-report',
      metadata: { code: details.code },
      error: error instanceof Error ? error : undefined,
    });
    process.exitCode = 2;
  });
