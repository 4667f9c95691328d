import { Command, CommanderError, Option } from 'commander';
import { runFormat, type ExitCode, type RunDeps } from '@moonfmt/core';
import { formatErrorChain } from '@moonfmt/shared';
import { version } from '../package.json';
import { CliFlagsSchema, collect, parseInteger, toRunOptions } from './options';

export interface CliDeps extends RunDeps {
  /** Receives usage messages and fatal errors */
  stderr?: NodeJS.WritableStream;
}

/**
 * Builds the `moonfmt` command. `report` receives the exit code of a completed run.
 */
export function createProgram(deps: CliDeps, report: (code: ExitCode) => void): Command {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const program = new Command();

  program
    .name('moonfmt')
    .description('Format Lua source files in parallel')
    .version(version)
    .argument('[files...]', 'files and directories to format; `-` reads from stdin')
    .option('-c, --check', 'print a diff instead of writing; exit 1 if any file would change')
    .option(
      '-g, --glob <pattern>',
      'select files found while walking directories (repeatable, `!` excludes)',
      collect,
      [],
    )
    .option('-n, --num-threads <n>', 'number of files formatted at once', parseInteger)
    .option('-v, --verbose', 'print pool and timing information to stderr')
    .addOption(
      new Option('--color <when>', 'color diff output')
        .choices(['auto', 'always', 'never'])
        .default('auto'),
    )
    .option('--range-start <offset>', 'first character offset to format', parseInteger)
    .option('--range-end <offset>', 'character offset to stop formatting at', parseInteger)
    .option('-f, --config-path <path>', 'configuration file to use')
    .addOption(new Option('--indent-type <type>', 'indent with').choices(['Tabs', 'Spaces']))
    .option('--indent-width <n>', 'columns per indentation level', parseInteger)
    .addOption(new Option('--line-endings <style>', 'line endings').choices(['Unix', 'Windows']))
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    })
    .action(async (files: unknown, _options: unknown, command: Command) => {
      const roots = Array.isArray(files) ? files.map(String) : [];
      const options = toRunOptions(roots, CliFlagsSchema.parse(command.opts()));
      const result = await runFormat(options, deps);
      report(result.exitCode);
    });

  return program;
}

/**
 * Runs the command line `argv` (as in `process.argv`) and returns the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or its own error
      return e.exitCode;
    }
    (deps.stderr ?? process.stderr).write(`${formatErrorChain(e)}\n`);
    return 1;
  }
  return exitCode;
}
