#!/usr/bin/env node
import { basename } from 'path';
import { DomainError, UsageError } from './core/errors';
import { logger } from './core/logger';
import { fillService } from './services/fill.service';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Run the simulator against two input files and print the report.
 * Resolves to the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIO = processIO, program: string = 'inventory-fill'): Promise<number> {
  try {
    const [itemsPath, inventoriesPath] = args;
    if (itemsPath === undefined || inventoriesPath === undefined) {
      throw UsageError.missingArguments(program);
    }

    const { report } = await fillService.runFiles(itemsPath, inventoriesPath);
    io.stdout(report);
    return 0;
  } catch (error) {
    if (error instanceof DomainError) {
      io.stderr(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), processIO, basename(process.argv[1] ?? 'inventory-fill'))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error }, 'Unexpected failure');
      process.exitCode = 1;
    });
}
