/**
 * `search-validator check` - health check and collection details
 */

import { Command } from 'commander';
import { SearchValidator } from '@/lib/services/search-validator';
import { EXIT_FATAL, EXIT_SUCCESS, reportError } from '../output';

export async function checkBackend(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const validator = SearchValidator.fromEnv(env);
    const check = await validator.check();

    console.log(`Backend:  ${check.backend} ${check.healthy ? '✓ healthy' : '✗ unreachable'}`);
    console.log(`Embedder: ${check.embedder} (${validator.embedder.getDimensions()} dimensions)`);

    if (!check.collection) return EXIT_FATAL;

    const { vectorSize, distanceMetric, pointCount, vectorName } = check.collection;
    console.log(`Collection:`);
    console.log(`  vector size: ${vectorSize ?? 'unknown'}${vectorName ? ` (${vectorName})` : ''}`);
    console.log(`  distance:    ${distanceMetric ?? 'unknown'}`);
    console.log(`  points:      ${pointCount}`);
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

export const checkCommand = new Command('check')
  .description('Check backend health and collection details')
  .action(async () => {
    process.exitCode = await checkBackend();
  });

export default checkCommand;
