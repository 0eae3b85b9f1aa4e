// Conversion module: engine processes, plan execution and the bounded pool

export { runProcess, TailBuffer, type CommandLine, type RunOptions, type ProcessOutcome } from './runner';
export {
  ConversionPipeline,
  buildDiagnostic,
  planLabel,
  type ExecuteContext,
  type PipelineOptions,
} from './pipeline';
export {
  ConversionService,
  safeStem,
  type ConvertContext,
  type ConversionServiceOptions,
} from './service';
