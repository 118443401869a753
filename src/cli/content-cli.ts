import { join, resolve } from 'node:path';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { lintContent } from '../content/pipeline.js';
import type { LintReport } from '../content/pipeline.js';
import { resolvePipelineConfig } from '../content/config.js';
import { writeSchemaArtifacts } from '../content/schema-artifacts.js';
import { ContentError, formatError } from '../kernel/content-error.js';
import { formatDiagnostic } from '../kernel/diagnostic-order.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { createLogger } from '../kernel/logger.js';
import type { Logger } from '../kernel/logger.js';

export const CLI_NAME = 'content-lint';
export const CLI_VERSION = '0.1.0';

export interface CliIo {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  readonly cwd: string;
  readonly logger: Logger;
}

const LintOptionsSchema = z.object({
  base: z.string().min(1).optional(),
  mods: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

const SchemasOptionsSchema = z.object({
  out: z.string().min(1),
});

export function defaultCliIo(): CliIo {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    cwd: process.cwd(),
    logger: createLogger('cli'),
  };
}

export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): string {
  const count = (severity: Diagnostic['severity']): number =>
    diagnostics.filter((diagnostic) => diagnostic.severity === severity).length;
  return `${count('error')} error(s), ${count('warning')} warning(s), ${count('info')} info`;
}

export function createContentCli(io: CliIo, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description('Validate content packs and export their JSON Schemas')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command('lint')
    .description('Resolve, decode, merge and validate a pack root without publishing anything')
    .argument('[packRoot]', 'Directory holding base/ and mods/', '.')
    .option('--base <dir>', 'Base pack directory (default: <packRoot>/base)')
    .option('--mods <dir>', 'Mods root directory (default: <packRoot>/mods)')
    .option('--json', 'Print the report as JSON')
    .action(async (packRoot: string, rawOptions: unknown) => {
      const options = LintOptionsSchema.parse(rawOptions);
      const root = resolve(io.cwd, packRoot);
      const config = resolvePipelineConfig(
        {
          baseDir: options.base ?? join(root, 'base'),
          modsDir: options.mods ?? join(root, 'mods'),
        },
        io.cwd,
      );
      io.logger.debug('Linting content', { baseDir: config.baseDir, modsDir: config.modsDir });

      let report: LintReport;
      try {
        report = await lintContent(config, { logger: io.logger.child('lint') });
      } catch (error) {
        if (error instanceof ContentError) {
          io.err(`error: ${error.message}`);
          setExitCode(1);
          return;
        }
        throw error;
      }

      if (options.json === true) {
        io.out(JSON.stringify(report, null, 2));
      } else {
        for (const diagnostic of report.diagnostics) {
          io.out(formatDiagnostic(diagnostic));
        }
        io.out(summarizeDiagnostics(report.diagnostics));
      }
      setExitCode(report.fatal ? 1 : 0);
    });

  program
    .command('schemas')
    .description('Write JSON Schemas (draft-7) for every content file type')
    .requiredOption('--out <dir>', 'Output directory')
    .action((rawOptions: unknown) => {
      const options = SchemasOptionsSchema.parse(rawOptions);
      const written = writeSchemaArtifacts(resolve(io.cwd, options.out));
      for (const filePath of written) {
        io.out(filePath);
      }
      setExitCode(0);
    });

  return program;
}

/** Runs the CLI against `argv` (without the node and script entries) and returns the exit code. */
export async function runContentCli(argv: readonly string[], io: CliIo = defaultCliIo()): Promise<number> {
  let exitCode = 0;
  const program = createContentCli(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.logger.error('content-lint failed', { error: formatError(error) });
    return 1;
  }
  return exitCode;
}
