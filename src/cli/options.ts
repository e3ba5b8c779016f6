import { type Command, InvalidArgumentError } from 'commander';

export type RawOptions = Record<string, unknown>;

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseIntegerOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** Accepts `nan` for float rasters whose no-data marker is NaN. */
export function parseNodataOption(value: string): number {
  return value.trim().toLowerCase() === 'nan' ? Number.NaN : parseNumberOption(value);
}

/** Options the user actually typed, so defaults never mask values from a config file. */
export function explicitOptions(command: Command): RawOptions {
  const values: RawOptions = {};

  for (const [key, value] of Object.entries(command.opts())) {
    if (command.getOptionValueSource(key) === 'cli') {
      values[key] = value;
    }
  }

  return values;
}

const isRecord = (value: unknown): value is RawOptions =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function assignDefined(target: RawOptions, key: string, value: unknown): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

export function conversionOverrides(cli: RawOptions, base: RawOptions): RawOptions {
  const result: RawOptions = {};
  assignDefined(result, 'inputDirectory', cli.input);
  assignDefined(result, 'outputDirectory', cli.output);
  assignDefined(result, 'nodataValue', cli.nodata);
  assignDefined(result, 'useDeclaredNodata', cli.useDeclaredNodata);
  assignDefined(result, 'recursive', cli.recursive);
  assignDefined(result, 'failFast', cli.failFast);

  if (cli.stretch !== undefined || cli.low !== undefined || cli.high !== undefined) {
    const stretch: RawOptions = isRecord(base.stretch) ? { ...base.stretch } : {};
    // --low or --high alone imply the percentile stretch.
    stretch.mode = cli.stretch ?? 'percentile';
    assignDefined(stretch, 'low', cli.low);
    assignDefined(stretch, 'high', cli.high);
    result.stretch = stretch;
  }

  return result;
}

export function animationOverrides(cli: RawOptions, base: RawOptions): RawOptions {
  const result: RawOptions = {};
  assignDefined(result, 'frameDurationMs', cli.duration);
  assignDefined(result, 'repeat', cli.repeat);
  assignDefined(result, 'colors', cli.colors);

  if (cli.overlay !== undefined || cli.label !== undefined) {
    const overlay: RawOptions = isRecord(base.overlay) ? { ...base.overlay } : {};
    assignDefined(overlay, 'enabled', cli.overlay);
    assignDefined(overlay, 'showLabel', cli.label);
    result.overlay = overlay;
  }

  return result;
}

/**
 * Layers CLI flags over a config file. Flag names follow the CLI, keys follow the pipeline
 * configuration.
 */
export function mergePipelineOptions(cli: RawOptions, file: RawOptions = {}): RawOptions {
  const merged: RawOptions = {
    ...file,
    ...conversionOverrides(cli, file),
    ...animationOverrides(cli, file),
  };
  assignDefined(merged, 'outputAnimationPath', cli.animation);
  return merged;
}
