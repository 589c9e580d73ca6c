/**
 * task-ledger CLI program.
 *
 * createProgram() builds a fresh Commander.js program; runCli() parses argv,
 * maps any failure to its exit code and never calls process.exit itself.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { closeLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { initCliContext } from './context.js';
import { cliError, cliOutput } from './renderers/index.js';
import { registerCreateCommand } from './commands/create.js';
import { registerListCommand } from './commands/list.js';
import { registerViewCommand } from './commands/view.js';
import { registerUpdateCommand } from './commands/update.js';
import { registerDeleteCommand } from './commands/delete.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerAuditCommand, registerAuditClearCommand } from './commands/audit.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerRestoreCommand } from './commands/restore.js';

const PackageJsonSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (err) {
    process.stderr.write(`Warning: cannot read ${pkgPath}: ${String(err)}\n`);
    return '0.0.0';
  }
}

export const CLI_VERSION = getPackageVersion();

/**
 * Build the program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('task-ledger')
    .description('Task records with checksummed storage, versioning and an audit trail')
    .version(CLI_VERSION)
    .option('--actor <name>', 'Actor recorded in audit entries (default: config defaultActor)')
    .option('--data-dir <dir>', 'Data directory (default: $TASK_LEDGER_DIR or .task-ledger)')
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting')
    .exitOverride();

  program
    .command('version')
    .description('Display task-ledger version')
    .action(() => {
      cliOutput({ version: CLI_VERSION }, { command: 'version' });
    });

  registerCreateCommand(program);
  registerListCommand(program);
  registerViewCommand(program);
  registerUpdateCommand(program);
  registerDeleteCommand(program);
  registerHistoryCommand(program);
  registerAuditCommand(program);
  registerAuditClearCommand(program);
  registerVerifyCommand(program);
  registerRestoreCommand(program);

  // Resolve options, config, logging and output format before any command runs.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    await initCliContext(actionCommand);
  });

  return program;
}

/**
 * Run the CLI against an argv array (node-style: executable and script first).
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return ExitCode.SUCCESS;
  } catch (err) {
    // Commander has already printed usage errors, --help and --version.
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    return cliError(err);
  } finally {
    closeLogger();
  }
}
