import type { PipelineOptions } from './pipeline';

/**
 *   node dist/local.js [--force] [--dry-run] [--no-save] [--no-duplicate-check]
 */
export function parseArgs(args: string[]): PipelineOptions {
  return {
    force: args.includes('--force'),
    dryRun: args.includes('--dry-run'),
    skipSave: args.includes('--no-save'),
    skipDuplicateCheck: args.includes('--no-duplicate-check')
  };
}
