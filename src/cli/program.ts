import { Command, Option } from 'commander';
import type { z } from 'zod';

import { AssembleDirectoryCommand, assembleDirectoryCommandSchema } from '@/application/assemble-animation/index.js';
import { ConvertRastersCommand, convertRastersCommandSchema } from '@/application/convert-rasters/index.js';
import { pipelineConfigSchema, RunPipelineCommand } from '@/application/pipeline/index.js';
import { createPipelineHandlers } from '@/bootstrap.js';
import { inspectAnimation, readConfigFile } from '@/infrastructure/index.js';
import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import {
  animationOverrides,
  conversionOverrides,
  explicitOptions,
  mergePipelineOptions,
  parseIntegerOption,
  parseNodataOption,
  parseNumberOption,
  type RawOptions,
} from './options.js';

const logger = createChildLogger({ module: 'cli' });

const EXIT_OK = 0;
const EXIT_FAILURE = 1;

function addConversionOptions(command: Command): Command {
  return command
    .option('-i, --input <dir>', 'Directory holding the TIFF rasters')
    .option('-o, --output <dir>', 'Directory receiving the PNG previews (created if absent)')
    .option('--nodata <value>', 'Sample value rendered transparent (use "nan" for NaN)', parseNodataOption)
    .option('--use-declared-nodata', 'Fall back to the GDAL_NODATA value stored in each file')
    .option('-r, --recursive', 'Descend into subdirectories')
    .addOption(new Option('--stretch <mode>', 'Contrast stretch').choices(['minmax', 'percentile']))
    .option('--low <percentile>', 'Lower percentile for the percentile stretch (default: 1)', parseNumberOption)
    .option('--high <percentile>', 'Upper percentile for the percentile stretch (default: 98)', parseNumberOption)
    .option('--fail-fast', 'Abort on the first raster that cannot be converted');
}

function addAnimationOptions(command: Command): Command {
  return command
    .option('-d, --duration <ms>', 'Display time of each frame in milliseconds (default: 300)', parseIntegerOption)
    .option('--repeat <count>', 'GIF repeat count: 0 loops forever, -1 plays once (default: 0)', parseIntegerOption)
    .option('--colors <count>', 'Palette size of each frame, 2 to 256 (default: 256)', parseIntegerOption)
    .option('--no-overlay', 'Do not draw the progress bar and label')
    .option('--no-label', 'Draw the progress bar without the frame label');
}

function validate<TSchema extends z.ZodTypeAny>(schema: TSchema, input: RawOptions, code: string): z.output<TSchema> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validation(code, { issues: parsed.error.issues });
  }
  return parsed.data;
}

async function loadBaseConfig(cli: RawOptions): Promise<RawOptions> {
  return typeof cli.config === 'string' ? readConfigFile(cli.config) : {};
}

async function runAction(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    const failure = AppError.fromUnknown(error, 'cli.failure');
    logger.error({ code: failure.code, error: failure.message }, 'Command failed');
    console.error(`${failure.code}: ${failure.message}`);
    if (failure.metadata.issues !== undefined) {
      console.error(JSON.stringify(failure.metadata.issues, null, 2));
    }
    process.exitCode = EXIT_FAILURE;
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('tiff-reel')
    .description('Turn a folder of TIFF rasters into PNG previews and a progress-annotated GIF')
    .version('0.1.0');

  addAnimationOptions(
    addConversionOptions(
      program
        .command('run')
        .description('Convert every raster, then assemble the previews into a GIF'),
    ),
  )
    .option('-a, --animation <file>', 'Path of the GIF to write')
    .option('-c, --config <file>', 'JSON file with pipeline configuration; flags take precedence')
    .showHelpAfterError()
    .action(async (_options: unknown, command: Command) =>
      runAction(async () => {
        const cli = explicitOptions(command);
        const config = validate(
          pipelineConfigSchema,
          mergePipelineOptions(cli, await loadBaseConfig(cli)),
          'pipeline.invalid-config',
        );
        const outcome = await createPipelineHandlers().pipeline.execute(new RunPipelineCommand(config));
        console.log(JSON.stringify(outcome, null, 2));
        return outcome.complete ? EXIT_OK : EXIT_FAILURE;
      }),
    );

  addConversionOptions(program.command('convert').description('Convert rasters to PNG previews only'))
    .option('-c, --config <file>', 'JSON file with conversion configuration; flags take precedence')
    .showHelpAfterError()
    .action(async (_options: unknown, command: Command) =>
      runAction(async () => {
        const cli = explicitOptions(command);
        const base = await loadBaseConfig(cli);
        const payload = validate(
          convertRastersCommandSchema,
          { ...base, ...conversionOverrides(cli, base) },
          'convert-rasters.invalid-payload',
        );
        const report = await createPipelineHandlers().convert.execute(new ConvertRastersCommand(payload));
        console.log(JSON.stringify(report, null, 2));
        return report.failures.length === 0 ? EXIT_OK : EXIT_FAILURE;
      }),
    );

  addAnimationOptions(program.command('assemble').description('Assemble a directory of PNG previews into a GIF'))
    .option('-i, --input <dir>', 'Directory holding the PNG previews')
    .option('-a, --animation <file>', 'Path of the GIF to write')
    .option('-r, --recursive', 'Descend into subdirectories')
    .showHelpAfterError()
    .action(async (_options: unknown, command: Command) =>
      runAction(async () => {
        const cli = explicitOptions(command);
        const payload = validate(
          assembleDirectoryCommandSchema,
          {
            ...animationOverrides(cli, {}),
            inputDirectory: cli.input,
            outputPath: cli.animation,
            recursive: cli.recursive,
          },
          'assemble-directory.invalid-payload',
        );
        const outcome = await createPipelineHandlers().assembleDirectory.execute(
          new AssembleDirectoryCommand(payload),
        );
        console.log(JSON.stringify(outcome, null, 2));
        return EXIT_OK;
      }),
    );

  program
    .command('inspect')
    .description('Report size, frame count and timing of a GIF')
    .argument('<gif>', 'GIF file to inspect')
    .action(async (gif: string) =>
      runAction(async () => {
        console.log(JSON.stringify(await inspectAnimation(gif), null, 2));
        return EXIT_OK;
      }),
    );

  return program;
}
