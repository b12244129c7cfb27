import { Command, CommanderError } from 'commander';
import { configureRunCommand, type ExecutorFactory } from './commands/run.js';
import { createInspectCommand } from './commands/inspect.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 *
 * The root command runs the benchmark:
 * `wasmbench <num_iterations> <enable_stack_trace>`.
 */
export function createProgram(createExecutor?: ExecutorFactory): Command {
  const program = new Command();

  program
    .name('wasmbench')
    .description(
      'Run an inference binary repeatedly and aggregate its per-phase timing and memory metrics'
    )
    .version(VERSION, '-v, --version', 'Output the current version')
    .allowExcessArguments(false);

  configureRunCommand(program, createExecutor);

  // Error handling. Added subcommands do not inherit the override.
  program.exitOverride();
  program.addCommand(createInspectCommand().exitOverride());

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(
  args: string[] = process.argv,
  createExecutor?: ExecutorFactory
): Promise<void> {
  const program = createProgram(createExecutor);

  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, the version or the usage error
      if (error.code !== 'commander.helpDisplayed' && error.code !== 'commander.version') {
        process.exitCode = error.exitCode;
      }
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { configureRunCommand, executeRun } from './commands/run.js';
export { createInspectCommand, executeInspect } from './commands/inspect.js';
