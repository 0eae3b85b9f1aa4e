// Format table, plan resolution and engine command templates

export { FormatResolver, type ResolverOptions } from './resolver';
export { loadFormatTable, parseFormatTable, applyEngineOverrides } from './table';
export {
  renderArgs,
  renderString,
  renderStageCommand,
  DEFAULT_DPI,
  type StagePaths,
  type TemplateValues,
} from './template';
