import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { version } from '@core/version';
import { TagweaveError } from '@core/errors';
import { cliLogger } from '@core/utils/logger';
import { formatDiagnostic, renderCommand, type RenderCommandOptions } from './commands/render';

export interface CLIIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CLIIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text)
};

export function createProgram(io: CLIIO = processIO): Command {
  const program = new Command();

  program
    .name('tagweave')
    .description('Resolve <source:path::processor/> tags in rendered text')
    .version(version);

  program
    .command('render')
    .description('Render a template file, substituting every tag')
    .argument('<template>', 'Template file to render')
    .option('-c, --context <file>', 'JSON file with get, post, cookie, server, session and globals sections')
    .option('--env', 'Expose environment variables as the server store')
    .option('--raw', 'Disable HTML escaping for every tag')
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .option('-d, --diagnostics', 'Report tags that failed to resolve')
    .option('-p, --project-path <dir>', 'Directory containing tagweave.config.json')
    .action((template: string, options: RenderCommandOptions) => {
      const result = renderCommand(template, options);

      if (options.output) {
        io.stderr(chalk.green(`Rendered ${template} to ${options.output}\n`));
      } else {
        io.stdout(result.output);
      }

      if (options.diagnostics) {
        for (const diagnostic of result.diagnostics) {
          io.stderr(formatDiagnostic(diagnostic) + '\n');
        }
      }
    });

  return program;
}

/**
 * Run the CLI. Returns the exit code instead of exiting.
 */
export async function main(argv: string[], io: CLIIO = processIO): Promise<number> {
  const program = createProgram(io);
  program.exitOverride();
  program.configureOutput({
    writeOut: text => io.stdout(text),
    writeErr: text => io.stderr(text)
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const message = error instanceof TagweaveError
      ? error.toString()
      : error instanceof Error ? error.message : String(error);
    cliLogger.debug('Command failed', { error: message });
    io.stderr(chalk.red(`Error: ${message}`) + '\n');
    return 1;
  }
}

