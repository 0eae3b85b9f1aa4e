import path from 'path';
import type {
  ConversionPlan,
  DocumentOperation,
  EngineDefinition,
  FormatDefinition,
  FormatTable,
  FormatTag,
  Stage,
  SupportedConversion,
  SupportedOperation,
} from '../types';
import { UnsupportedConversionError } from '../errors';

export interface ResolverOptions {
  /** Engines allowed to contribute edges; all engines when omitted */
  enabledEngines?: readonly string[];
}

interface DirectEdge {
  engine: EngineDefinition;
  from: FormatTag;
  to: FormatTag;
  /** Position in the table, used as the last tie-breaker */
  order: number;
}

interface Candidate {
  edges: DirectEdge[];
  native: boolean;
}

/**
 * Maps (input format, output format) pairs to conversion plans
 *
 * The supported-format graph is the fixed table it was built from. Plans have
 * at most two stages; among candidates the resolver prefers
 * 1. the fewest stages,
 * 2. a first stage whose engine belongs to the input format's native suite,
 * 3. table order.
 *
 * Resolution is pure and plans are cached per pair.
 */
export class FormatResolver {
  private readonly formats = new Map<FormatTag, FormatDefinition>();
  private readonly aliases = new Map<string, FormatTag>();
  private readonly edges: DirectEdge[] = [];
  private readonly cache = new Map<string, ConversionPlan | null>();
  private readonly operations = new Map<DocumentOperation, ConversionPlan>();

  constructor(table: FormatTable, options: ResolverOptions = {}) {
    for (const format of table.formats) {
      this.formats.set(format.tag, format);
      this.aliases.set(format.tag, format.tag);
      for (const alias of format.aliases ?? []) {
        this.aliases.set(alias, format.tag);
      }
    }

    const enabled = options.enabledEngines ? new Set(options.enabledEngines) : undefined;
    const engines = new Map(table.engines.map((engine) => [engine.id, engine]));

    for (const edge of table.edges) {
      const engine = engines.get(edge.engine);
      if (!engine || (enabled && !enabled.has(engine.id))) continue;

      for (const from of edge.from) {
        for (const to of edge.to) {
          if (from === to) continue;
          this.edges.push({ engine, from, to, order: this.edges.length });
        }
      }
    }

    for (const operation of table.operations ?? []) {
      const engine = engines.get(operation.engine);
      if (!engine || (enabled && !enabled.has(engine.id))) continue;

      const stage = this.toStage({ engine, from: operation.format, to: operation.format, order: -1 });
      this.operations.set(
        operation.id,
        Object.freeze({
          input: operation.format,
          output: operation.format,
          stages: Object.freeze([stage]),
          operation: operation.id,
        })
      );
    }
  }

  /**
   * Canonical tag for a format name, extension or alias ("JPEG", ".jpeg" -> "jpg")
   */
  normalize(name: string): FormatTag | undefined {
    const key = name.trim().toLowerCase().replace(/^\./, '');
    return this.aliases.get(key);
  }

  /**
   * Format implied by a file name's extension
   */
  formatForFileName(fileName: string): FormatTag | undefined {
    const extension = path.extname(fileName);
    return extension ? this.normalize(extension) : undefined;
  }

  getFormat(tag: FormatTag): FormatDefinition {
    const canonical = this.normalize(tag);
    const format = canonical === undefined ? undefined : this.formats.get(canonical);
    if (!format) {
      throw new UnsupportedConversionError(`unknown format "${tag}"`);
    }
    return format;
  }

  listFormats(): FormatDefinition[] {
    return [...this.formats.values()];
  }

  /**
   * Compute the plan converting `inputFormat` into `outputFormat`
   *
   * @throws UnsupportedConversionError for unknown formats or when no plan of
   *   at most two stages exists
   */
  resolve(inputFormat: string, outputFormat: string): ConversionPlan {
    const input = this.getFormat(inputFormat).tag;
    const output = this.getFormat(outputFormat).tag;

    const plan = this.lookup(input, output);
    if (!plan) {
      throw new UnsupportedConversionError(`${input} to ${output}`, {
        inputFormat: input,
        outputFormat: output,
      });
    }
    return plan;
  }

  /**
   * Every supported (input, output) pair, identity excluded
   */
  listConversions(): SupportedConversion[] {
    const conversions: SupportedConversion[] = [];
    for (const input of this.formats.keys()) {
      for (const output of this.formats.keys()) {
        if (input === output) continue;
        const plan = this.lookup(input, output);
        if (plan) {
          conversions.push({
            input,
            output,
            stages: plan.stages.length,
            engines: plan.stages.map((stage) => stage.engine),
          });
        }
      }
    }
    return conversions;
  }

  /**
   * The single-stage plan for a split or merge
   *
   * @throws UnsupportedConversionError when no enabled engine provides it
   */
  resolveOperation(operation: DocumentOperation): ConversionPlan {
    const plan = this.operations.get(operation);
    if (!plan) {
      throw new UnsupportedConversionError(`${operation} is not available`, { operation });
    }
    return plan;
  }

  listOperations(): SupportedOperation[] {
    return [...this.operations.values()].flatMap((plan) =>
      plan.operation ? [{ operation: plan.operation, format: plan.input, engine: plan.stages[0].engine }] : []
    );
  }

  private lookup(input: FormatTag, output: FormatTag): ConversionPlan | undefined {
    const key = `${input}>${output}`;
    if (!this.cache.has(key)) {
      this.cache.set(key, this.search(input, output));
    }
    return this.cache.get(key) ?? undefined;
  }

  private search(input: FormatTag, output: FormatTag): ConversionPlan | null {
    if (input === output) {
      return Object.freeze({ input, output, stages: Object.freeze([]) });
    }

    const inputSuite = this.getFormat(input).nativeSuite;
    const candidates: Candidate[] = [];

    for (const first of this.edges) {
      if (first.from !== input) continue;

      if (first.to === output) {
        candidates.push({ edges: [first], native: first.engine.suite === inputSuite });
        continue;
      }

      // Only a terminal stage may produce a page sequence
      if (first.engine.output.kind !== 'file') continue;

      for (const second of this.edges) {
        if (second.from === first.to && second.to === output) {
          candidates.push({ edges: [first, second], native: first.engine.suite === inputSuite });
        }
      }
    }

    if (candidates.length === 0) {
      return null;
    }

    candidates.sort(compareCandidates);
    const stages = candidates[0].edges.map((edge) => this.toStage(edge));

    return Object.freeze({ input, output, stages: Object.freeze(stages) });
  }

  private toStage(edge: DirectEdge): Stage {
    return Object.freeze({
      engine: edge.engine.id,
      suite: edge.engine.suite,
      input: edge.from,
      output: edge.to,
      command: edge.engine.command,
      template: edge.engine.args,
      outputSpec: edge.engine.output,
      timeoutMs: edge.engine.timeoutMs,
      multiInput: edge.engine.multiInput ?? false,
    });
  }
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.edges.length !== b.edges.length) {
    return a.edges.length - b.edges.length;
  }
  if (a.native !== b.native) {
    return a.native ? -1 : 1;
  }
  for (let i = 0; i < a.edges.length; i++) {
    if (a.edges[i].order !== b.edges[i].order) {
      return a.edges[i].order - b.edges[i].order;
    }
  }
  return 0;
}
