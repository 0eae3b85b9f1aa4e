import path from 'path';
import { pathToFileURL } from 'url';
import type {
  ConditionalArgs,
  ConversionOptions,
  FormatDefinition,
  OutputSpec,
  Stage,
  TemplateArg,
  TemplateToken,
} from '../types';
import { ConfigurationError } from '../errors';

export const DEFAULT_DPI = 150;

const PLACEHOLDER = /\{(\w+)\}/g;

export const TEMPLATE_TOKENS: readonly TemplateToken[] = [
  'input',
  'outdir',
  'output',
  'stem',
  'target',
  'extension',
  'profile',
  'profileUrl',
  'device',
  'dpi',
  'quality',
  'pageSize',
  'firstPage',
  'lastPage',
  'pages',
];

/** An argument that expands to every input file of a multi-input stage */
export const INPUTS_ARG = '{inputs}';

export function isTemplateToken(value: unknown): value is TemplateToken {
  return typeof value === 'string' && TEMPLATE_TOKENS.some((token) => token === value);
}

export type TemplateValues = Partial<Record<TemplateToken, string>>;

export interface StageCommand {
  command: string;
  args: string[];
}

export interface StagePaths {
  /** Absolute path of the stage's (first) input file */
  inputPath: string;
  /** Every input file, in order; defaults to `[inputPath]` */
  inputPaths?: readonly string[];
  /** Directory the engine must write into */
  outdir: string;
  /** Private engine profile directory for this stage */
  profileDir: string;
}

/**
 * Substitute `{token}` placeholders in one argument
 *
 * @throws ConfigurationError when the template names a token that has no value
 */
export function renderString(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match: string, token: string) => {
    const value = isTemplateToken(token) ? values[token] : undefined;
    if (value === undefined) {
      throw new ConfigurationError(`template token ${match} has no value`);
    }
    return value;
  });
}

/** The formats a stage reads and writes */
export interface StageFormats {
  input: string;
  output: string;
}

function groupApplies(group: ConditionalArgs, values: TemplateValues, formats: StageFormats): boolean {
  if (group.when !== undefined && values[group.when] === undefined) return false;
  if (group.formats && !group.formats.includes(formats.output)) return false;
  if (group.inputs && !group.inputs.includes(formats.input)) return false;
  return true;
}

/**
 * Expand an argument template into an argv list
 *
 * Conditional groups are dropped when their option is unset, or when they are
 * restricted to other output or input formats. `{inputs}` becomes one argument
 * per entry of `inputPaths`.
 */
export function renderArgs(
  template: readonly TemplateArg[],
  values: TemplateValues,
  formats: StageFormats,
  inputPaths: readonly string[] = []
): string[] {
  const args: string[] = [];
  for (const arg of template) {
    if (arg === INPUTS_ARG) {
      if (inputPaths.length === 0) {
        throw new ConfigurationError(`template token ${INPUTS_ARG} has no value`);
      }
      args.push(...inputPaths);
      continue;
    }
    if (typeof arg === 'string') {
      args.push(renderString(arg, values));
      continue;
    }
    if (!groupApplies(arg, values, formats)) continue;
    for (const groupArg of arg.args) {
      args.push(renderString(groupArg, values));
    }
  }
  return args;
}

function optional(value: number | string | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

/**
 * Where the stage's output is expected, relative to the stage output directory
 */
export function renderOutputName(output: OutputSpec, values: TemplateValues): string {
  return output.kind === 'file' ? renderString(output.name, values) : renderString(output.prefix, values);
}

/**
 * Build the token values for one stage invocation
 */
export function stageValues(
  output: FormatDefinition,
  paths: StagePaths,
  options: ConversionOptions
): TemplateValues {
  const values: TemplateValues = {
    input: paths.inputPath,
    outdir: paths.outdir,
    stem: path.basename(paths.inputPath, path.extname(paths.inputPath)),
    extension: output.extension,
    target: output.officeFilter ?? output.extension,
    device: output.rasterDevice ?? output.extension,
    profile: paths.profileDir,
    profileUrl: pathToFileURL(paths.profileDir).href,
    dpi: String(options.dpi ?? DEFAULT_DPI),
    quality: optional(options.quality),
    pageSize: optional(options.pageSize),
    firstPage: optional(options.firstPage),
    lastPage: optional(options.lastPage),
    pages: optional(options.pages),
  };
  return values;
}

/**
 * Render the full command line for a stage
 */
export function renderStageCommand(
  stage: Stage,
  output: FormatDefinition,
  paths: StagePaths,
  options: ConversionOptions
): StageCommand & { outputName: string } {
  const values = stageValues(output, paths, options);
  const outputName = renderOutputName(stage.outputSpec, values);
  values.output = path.join(paths.outdir, outputName);

  return {
    command: stage.command,
    args: renderArgs(stage.template, values, stage, paths.inputPaths ?? [paths.inputPath]),
    outputName,
  };
}
