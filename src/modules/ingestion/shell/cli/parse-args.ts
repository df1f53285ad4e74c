/**
 * Command line arguments of the CSV ingestion script.
 */

import { err, ok, type Result } from 'neverthrow';

import { MAX_UPSERT_BATCH_SIZE } from '@/common/constants/upsert-batch.js';
import { isModuleName, type ModuleName } from '@/modules/code-registry/index.js';

export interface IngestCliOptions {
  csvPath: string;
  modules: ModuleName[];
  clear: boolean;
  batchSize: number | undefined;
}

export const INGEST_USAGE =
  'Usage: tsx scripts/ingest-csv.ts --csv <path> [--module <name>]... [--clear] [--batch-size <n>]';

export const parseIngestArgs = (args: readonly string[]): Result<IngestCliOptions, string> => {
  let csvPath: string | undefined;
  const modules: ModuleName[] = [];
  let clear = false;
  let batchSize: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--csv':
        if (nextArg === undefined) return err('--csv needs a file path');
        csvPath = nextArg;
        i++;
        break;
      case '--module':
        if (nextArg === undefined || !isModuleName(nextArg)) {
          return err(`--module must be one of crop, animal, bioenergy, landcover`);
        }
        if (!modules.includes(nextArg)) modules.push(nextArg);
        i++;
        break;
      case '--clear':
        clear = true;
        break;
      case '--batch-size': {
        const size = nextArg !== undefined && /^\d+$/.test(nextArg) ? Number(nextArg) : 0;
        if (size < 1) return err('--batch-size must be a positive integer');
        if (size > MAX_UPSERT_BATCH_SIZE) {
          return err(`--batch-size must be at most ${String(MAX_UPSERT_BATCH_SIZE)}`);
        }
        batchSize = size;
        i++;
        break;
      }
      default:
        return err(`Unknown argument '${String(arg)}'`);
    }
  }

  if (csvPath === undefined) {
    return err('--csv is required');
  }

  return ok({ csvPath, modules, clear, batchSize });
};
