// Type definitions for the conversion service

export interface HealthStatus {
  status: 'ok';
}

export interface ReadinessStatus {
  ready: boolean;
  checks?: {
    /** Engine id -> binary found on PATH */
    engines?: Record<string, boolean>;
  };
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  // Conversion pipeline settings
  conversionWorkdir: string;
  conversionMaxConcurrent: number;
  maxUploadBytes: number;
  maxDiagnosticBytes: number;
  enabledEngines: string[];
  formatTablePath?: string;
  /** Per-engine timeout overrides in milliseconds */
  engineTimeouts: Record<string, number>;
  /** Per-engine binary overrides */
  enginePaths: Record<string, string>;
  // Azure Application Insights settings
  azureMonitorConnectionString?: string;
  enableTelemetry: boolean;
}

// Format table

/** Lower-case format identifier, e.g. "docx", "pdf", "png" */
export type FormatTag = string;

export type FormatFamily = 'text' | 'spreadsheet' | 'presentation' | 'pdf' | 'image';

/** Tool family an engine belongs to; formats name the suite that handles them natively */
export type EngineSuite = 'office' | 'poppler' | 'ghostscript' | 'imagemagick' | 'ebook';

export interface FormatDefinition {
  tag: FormatTag;
  extension: string;
  mediaType: string;
  family: FormatFamily;
  nativeSuite: EngineSuite;
  /** Export filter passed to the office engine (defaults to the extension) */
  officeFilter?: string;
  /** Device or flag name the raster engine producing this format expects */
  rasterDevice?: string;
  aliases?: string[];
}

/**
 * One command-line argument: a literal with `{token}` placeholders, the bare
 * `{inputs}` argument (every input file, for engines that take several), or a
 * conditional group.
 */
export type TemplateArg = string | ConditionalArgs;

/**
 * Arguments emitted only when every condition holds: the `when` option has a
 * value, the stage produces one of `formats`, the stage reads one of `inputs`
 */
export interface ConditionalArgs {
  when?: TemplateToken;
  args: string[];
  formats?: FormatTag[];
  inputs?: FormatTag[];
}

export type TemplateToken =
  | 'input'
  | 'outdir'
  | 'output'
  | 'stem'
  | 'target'
  | 'extension'
  | 'profile'
  | 'profileUrl'
  | 'device'
  | 'dpi'
  | 'quality'
  | 'pageSize'
  | 'firstPage'
  | 'lastPage'
  | 'pages';

/**
 * Where an engine leaves its result inside the stage output directory.
 * `file` names a single file; `sequence` collects every `prefix*.extension` in page order.
 */
export type OutputSpec =
  | { kind: 'file'; name: string }
  | { kind: 'sequence'; prefix: string };

export interface EngineDefinition {
  id: string;
  suite: EngineSuite;
  command: string;
  args: TemplateArg[];
  output: OutputSpec;
  timeoutMs: number;
  /** Takes every part of its input artifact at once (`{inputs}`) */
  multiInput?: boolean;
}

export interface ConversionEdge {
  engine: string;
  from: FormatTag[];
  to: FormatTag[];
}

/** Page-level document operations that keep the format */
export type DocumentOperation = 'split' | 'merge';

export interface OperationDefinition {
  id: DocumentOperation;
  engine: string;
  format: FormatTag;
}

export interface FormatTable {
  formats: FormatDefinition[];
  engines: EngineDefinition[];
  edges: ConversionEdge[];
  operations?: OperationDefinition[];
}

// Plans

export interface Stage {
  engine: string;
  suite: EngineSuite;
  input: FormatTag;
  output: FormatTag;
  command: string;
  template: TemplateArg[];
  outputSpec: OutputSpec;
  timeoutMs: number;
  multiInput: boolean;
}

export interface ConversionPlan {
  readonly input: FormatTag;
  readonly output: FormatTag;
  readonly stages: readonly Stage[];
  /** Set for split and merge plans */
  readonly operation?: DocumentOperation;
}

export interface SupportedConversion {
  input: FormatTag;
  output: FormatTag;
  stages: number;
  engines: string[];
}

// Requests and results

export type PageSize = 'A3' | 'A4' | 'A5' | 'Letter' | 'Legal';

/** Options a caller may pass through to the engines */
export interface ConversionOptions {
  /** Raster resolution for PDF -> image stages */
  dpi?: number;
  /** JPEG quality (1-100) */
  quality?: number;
  /** Page size for image -> PDF stages */
  pageSize?: PageSize;
  /** First page to rasterize (1-based) */
  firstPage?: number;
  /** Last page to rasterize (1-based, inclusive) */
  lastPage?: number;
  /** Pages to keep when splitting, e.g. "1-3,5" */
  pages?: string;
}

export type PageSelection = Pick<ConversionOptions, 'pages' | 'firstPage' | 'lastPage'>;

export interface ConversionRequest {
  fileName: string;
  content: Buffer;
  inputFormat: FormatTag;
  outputFormat: FormatTag;
  options: ConversionOptions;
}

export interface SplitRequest {
  fileName: string;
  content: Buffer;
  inputFormat: FormatTag;
  options: PageSelection;
}

export interface MergeRequest {
  /** Documents in the order they are joined */
  files: Array<{ fileName: string; content: Buffer; inputFormat: FormatTag }>;
}

export interface ArtifactPart {
  name: string;
  path: string;
  size: number;
}

/**
 * A named byte blob owned by one scope. Sequences (page images) carry one part
 * per page, in page order.
 */
export interface Artifact {
  readonly id: string;
  readonly scopeId: string;
  readonly name: string;
  readonly format: FormatTag;
  readonly parts: readonly ArtifactPart[];
  readonly size: number;
}

export type FailureKind =
  | 'UnsupportedConversion'
  | 'InvalidInput'
  | 'EngineFailure'
  | 'EngineTimeout'
  | 'ResourceError'
  | 'Cancelled';

export interface ConversionFailure {
  kind: FailureKind;
  message: string;
  stage?: number;
  engine?: string;
  exitCode?: number | null;
  timeoutMs?: number;
  diagnostic?: string;
}

export interface StageReport {
  index: number;
  engine: string;
  input: FormatTag;
  output: FormatTag;
  durationMs: number;
  outputParts: number;
}

export type ConversionResult =
  | {
      ok: true;
      artifact: Artifact;
      plan: ConversionPlan;
      stages: StageReport[];
      durationMs: number;
    }
  | {
      ok: false;
      failure: ConversionFailure;
      stages: StageReport[];
      durationMs: number;
    };

/** What the service hands back to the HTTP layer */
export interface ConvertedDocument {
  fileName: string;
  mediaType: string;
  body: Buffer;
  plan: ConversionPlan;
  /** True when the body is a zip of page images */
  sequence: boolean;
  /** Number of files the plan produced (pages, for sequences) */
  pageCount: number;
  durationMs: number;
}

/**
 * Conversion pool statistics
 * Tracks job execution and pool state for observability
 */
export interface ConversionPoolStats {
  /** Number of currently active conversion jobs */
  activeJobs: number;
  /** Number of jobs waiting in queue */
  queuedJobs: number;
  /** Total number of successfully completed conversions */
  completedJobs: number;
  /** Total number of failed conversions */
  failedJobs: number;
  /** Total number of conversion attempts (completed + failed) */
  totalConversions: number;
}

// HTTP

export interface ConvertRequestBody {
  fileName: string;
  /** Base64-encoded document */
  content: string;
  outputFormat: string;
  inputFormat?: string;
  options?: ConversionOptions;
}

export interface SplitRequestBody extends PageSelection {
  fileName: string;
  /** Base64-encoded PDF */
  content: string;
}

export interface MergeRequestBody {
  files: Array<{ fileName: string; content: string }>;
}

export interface SupportedOperation {
  operation: DocumentOperation;
  format: FormatTag;
  engine: string;
}

export interface FormatsResponse {
  formats: Array<{ tag: FormatTag; extension: string; mediaType: string; family: FormatFamily }>;
  conversions: SupportedConversion[];
  operations: SupportedOperation[];
}
