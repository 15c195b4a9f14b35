import { EventEmitter } from 'eventemitter3';
import type { LanguageModel } from 'ai';
import {
  DegradedSourceWarning,
  ExternalCallError,
  ReportError,
  SchemaMappingError,
  SourceFetchError,
  type ReportStage,
} from '../errors.js';
import { SOURCE_IDS, sectionRank, type SourceId } from '../schema/vocabulary.js';
import { normalize } from '../normalize/normalizer.js';
import type { DateRange, NormalizeResult, RawDataset } from '../normalize/types.js';
import {
  COMPARISON_PERIOD,
  COMPARISON_PREFIX,
  CURRENT_PERIOD,
  IdRegistry,
  RegistryGroup,
} from '../registry/id-registry.js';
import { buildSections, orderSections, type Section } from '../format/sections.js';
import { formatSections } from '../format/table.js';
import { compose, DEFAULT_INSTRUCTIONS } from '../prompt/composer.js';
import { checkPromptSize, DEFAULT_GENERATION, generateNarrative } from '../generate/narrative.js';
import { validateCitations } from '../verification/citations.js';
import { buildFooter } from '../verification/footer.js';
import { omissionFromWarning, type CoverageReport, type Omission } from '../verification/types.js';
import { CostTracker } from '../router/cost.js';
import { ProviderRegistry } from '../router/providers.js';
import { AbortError, classifyError } from '../router/timeout.js';
import { formatRange } from '../period.js';
import type {
  ReportContext,
  ReportDocument,
  ReportEvents,
  ReportUsage,
  SourceSpec,
} from './types.js';

export const REPORT_STAGES: readonly ReportStage[] = [
  'fetch',
  'normalize',
  'compose',
  'generate',
  'validate',
  'finalize',
];

const UNAVAILABLE_FOR_CURRENT = 'omitted: no current-period data to compare against';

interface PeriodPlan {
  label: string;
  prefix?: string;
  range: DateRange;
}

interface FetchOutcome {
  spec: SourceSpec;
  plan: PeriodPlan;
  datasets: RawDataset[];
}

/**
 * Run-scoped state. A new one is built for every run, so nothing (ID
 * counters in particular) carries over between reports.
 */
interface RunState {
  fetched: FetchOutcome[];
  registries: IdRegistry[];
  sections: Section[];
  omissions: Omission[];
  warnings: string[];
  prompt: string;
  narrative?: string;
  coverage?: CoverageReport;
  usage: ReportUsage;
}

// ---------------------------------------------------------------------------
// Report pipeline
// ---------------------------------------------------------------------------

/**
 * fetch → normalize → compose → generate → validate → finalize.
 *
 * Fetches run concurrently; every later stage consumes the complete output
 * of the one before it.
 */
export class ReportPipeline extends EventEmitter<ReportEvents> {
  private readonly context: ReportContext;
  private readonly costTracker = new CostTracker();
  private readonly providers: ProviderRegistry;
  private currentStage?: ReportStage;

  constructor(context: ReportContext) {
    super();
    this.context = context;
    this.providers = new ProviderRegistry(context.providerConfig);
  }

  get totalCost(): number {
    return this.costTracker.totalSpent;
  }

  async run(): Promise<ReportDocument> {
    const started = Date.now();
    const state: RunState = {
      fetched: [],
      registries: [],
      sections: [],
      omissions: [],
      warnings: [],
      prompt: '',
      usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
    };

    try {
      await this.stage('fetch', () => this.fetchAll(state));
      await this.stage('normalize', async () => this.normalizeAll(state));
      await this.stage('compose', async () => this.composePrompt(state));

      if (this.context.dryRun) {
        for (const stage of REPORT_STAGES.slice(REPORT_STAGES.indexOf('generate'))) {
          this.emit('stage:skipped', { stage, reason: 'dry run' });
        }
      } else {
        await this.stage('generate', () => this.generate(state));
        await this.stage('validate', async () => this.validate(state));
      }

      const report = this.context.dryRun
        ? this.dryRunDocument(state)
        : await this.stage('finalize', async () => this.finalize(state));

      this.emit('report:complete', { report, totalDurationMs: Date.now() - started });
      return report;
    } catch (err) {
      const error = this.asReportError(err);
      this.emit('report:error', { error, stage: this.currentStage });
      throw error;
    }
  }

  private async stage<T>(stage: ReportStage, fn: () => Promise<T>): Promise<T> {
    if (this.context.abortSignal?.aborted) {
      throw new AbortError(`Report aborted before ${stage}`);
    }
    this.currentStage = stage;
    const index = REPORT_STAGES.indexOf(stage);
    this.emit('stage:start', { stage, stageIndex: index, totalStages: REPORT_STAGES.length });

    const start = Date.now();
    try {
      const result = await fn();
      this.emit('stage:complete', {
        stage,
        durationMs: Date.now() - start,
        detail: typeof result === 'string' ? result : '',
      });
      return result;
    } catch (err) {
      const error = this.asReportError(err);
      this.emit('stage:error', { stage, error });
      throw error;
    }
  }

  private asReportError(err: unknown): Error {
    if (err instanceof ReportError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ReportError(message, this.currentStage ?? 'fetch');
  }

  private periods(): PeriodPlan[] {
    const plans: PeriodPlan[] = [{ label: CURRENT_PERIOD, range: this.context.period.current }];
    if (this.context.period.comparison) {
      plans.push({ label: COMPARISON_PERIOD, prefix: COMPARISON_PREFIX, range: this.context.period.comparison });
    }
    return plans;
  }

  /** Sources in declared order, regardless of configuration order. */
  private orderedSources(): SourceSpec[] {
    const rank = (id: SourceId) => SOURCE_IDS.indexOf(id);
    return [...this.context.sources].sort((a, b) => rank(a.id) - rank(b.id));
  }

  private degrade(state: RunState, warning: DegradedSourceWarning, period: string): void {
    state.omissions.push(omissionFromWarning(warning, period));
    this.emit('source:degraded', { warning, period });
  }

  // -------------------------------------------------------------------------
  // fetch
  // -------------------------------------------------------------------------

  private async fetchAll(state: RunState): Promise<string> {
    const sources = this.orderedSources();
    const plans = this.periods();

    for (const spec of sources) {
      if (spec.fetcher) continue;
      if (spec.required) {
        throw new SourceFetchError('Required source is not configured', spec.id);
      }
      for (const plan of plans) {
        this.degrade(state, new DegradedSourceWarning(spec.id, 'source not configured'), plan.label);
      }
    }

    const tasks = sources.flatMap(spec => {
      const fetcher = spec.fetcher;
      if (!fetcher) return [];
      return plans.map(plan => ({
        spec,
        plan,
        promise: fetcher.fetch(plan.range, { abortSignal: this.context.abortSignal }),
      }));
    });

    const settled = await Promise.allSettled(tasks.map(t => t.promise));

    settled.forEach((result, i) => {
      const task = tasks[i];
      if (!task) return;
      if (result.status === 'fulfilled') {
        state.fetched.push({ spec: task.spec, plan: task.plan, datasets: result.value });
        return;
      }

      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      if (task.spec.required && task.plan.label === CURRENT_PERIOD) {
        throw new SourceFetchError(`Fetch failed: ${reason}`, task.spec.id, result.reason);
      }
      this.degrade(state, new DegradedSourceWarning(task.spec.id, `fetch failed: ${reason}`), task.plan.label);
    });

    this.emit('datasets:fetched', { datasets: state.fetched.flatMap(f => f.datasets) });

    // A source missing from the current period has nothing to compare against.
    const failedCurrent = new Set(
      tasks.filter((t, i) => t.plan.label === CURRENT_PERIOD && settled[i]?.status === 'rejected').map(t => t.spec.id),
    );
    state.fetched = state.fetched.filter(outcome => {
      if (outcome.plan.label === CURRENT_PERIOD || !failedCurrent.has(outcome.spec.id)) return true;
      this.degrade(state, new DegradedSourceWarning(outcome.spec.id, UNAVAILABLE_FOR_CURRENT), outcome.plan.label);
      return false;
    });

    const datasetCount = state.fetched.reduce((n, f) => n + f.datasets.length, 0);
    return `${datasetCount} datasets from ${new Set(state.fetched.map(f => f.spec.id)).size} sources`;
  }

  // -------------------------------------------------------------------------
  // normalize
  // -------------------------------------------------------------------------

  private normalizeAll(state: RunState): string {
    const options = { precision: this.context.precision, percentMetrics: this.context.percentMetrics };

    // (source, dimension) pairs that failed to map for the current period.
    const degradedCurrent = new Set<string>();

    for (const plan of this.periods()) {
      const registry = new IdRegistry({ prefix: plan.prefix, period: plan.label });

      for (const spec of this.orderedSources()) {
        const outcome = state.fetched.find(f => f.spec.id === spec.id && f.plan.label === plan.label);
        if (!outcome) continue;

        const datasets = [...outcome.datasets].sort(
          (a, b) => sectionRank(a.source, a.dimension) - sectionRank(b.source, b.dimension),
        );

        for (const dataset of datasets) {
          const pair = `${spec.id}:${dataset.dimension}`;
          if (plan.label !== CURRENT_PERIOD && degradedCurrent.has(pair)) {
            this.degrade(state, new DegradedSourceWarning(spec.id, UNAVAILABLE_FOR_CURRENT, dataset.dimension), plan.label);
            continue;
          }

          let result: NormalizeResult;
          try {
            result = normalize(dataset, options);
          } catch (err) {
            if (!(err instanceof SchemaMappingError)) throw err;
            if (spec.required && plan.label === CURRENT_PERIOD) throw err;
            if (plan.label === CURRENT_PERIOD) degradedCurrent.add(pair);
            this.degrade(
              state,
              new DegradedSourceWarning(spec.id, err.message.replace(/^\[[^\]]+\]\s*/, ''), dataset.dimension),
              plan.label,
            );
            continue;
          }

          for (const message of result.warnings) {
            state.warnings.push(message);
            this.emit('normalize:warning', { source: spec.id, message });
          }
          if (result.records.length === 0) {
            state.omissions.push({
              source: spec.id,
              dimension: dataset.dimension,
              period: plan.label,
              reason: 'no rows for this period',
            });
            continue;
          }
          registry.registerAll(result.records);
        }
      }

      state.registries.push(registry);
    }

    const counts = state.registries.map(r => `${r.size} ${r.period}`).join(', ');
    return `${counts} records`;
  }

  // -------------------------------------------------------------------------
  // compose
  // -------------------------------------------------------------------------

  private composePrompt(state: RunState): string {
    const [current, ...others] = state.registries;
    const currentSections = current ? buildSections(current) : [];
    const comparisonSections = others.flatMap(r => buildSections(r, { comparison: true }));
    state.sections = orderSections(currentSections, comparisonSections);

    state.prompt = compose(
      state.sections,
      this.context.instructions ?? DEFAULT_INSTRUCTIONS,
      this.context.period,
    );
    const tokens = checkPromptSize(
      state.prompt,
      this.context.modelId,
      this.context.maxOutputTokens ?? DEFAULT_GENERATION.maxOutputTokens,
    );
    return `${state.sections.length} sections, ~${tokens} tokens`;
  }

  // -------------------------------------------------------------------------
  // generate
  // -------------------------------------------------------------------------

  private async generate(state: RunState): Promise<string> {
    const { modelId } = this.context;
    let model: LanguageModel;
    try {
      model = this.providers.getModel(modelId);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ExternalCallError(message, classifyError(err), err);
    }

    const response = await generateNarrative({
      prompt: state.prompt,
      model,
      modelId,
      timeoutMs: this.context.timeoutMs,
      maxOutputTokens: this.context.maxOutputTokens,
      budget: { maxCostUsd: this.context.maxBudgetUsd, tracker: this.costTracker },
      abortSignal: this.context.abortSignal,
    });

    state.narrative = response.content;
    state.usage = response.usage;
    return `${response.usage.outputTokens} output tokens, $${response.usage.costUsd.toFixed(4)}`;
  }

  // -------------------------------------------------------------------------
  // validate
  // -------------------------------------------------------------------------

  private validate(state: RunState): string {
    const { narrative, coverage } = validateCitations(
      state.narrative ?? '',
      new RegistryGroup(state.registries),
      { mode: this.context.citationMode },
    );
    state.narrative = narrative;
    state.coverage = coverage;
    const stripped = coverage.invalidCitations.length;
    return stripped > 0
      ? `${coverage.validCitations} valid citations, ${stripped} unresolved removed`
      : `${coverage.validCitations} valid citations`;
  }

  // -------------------------------------------------------------------------
  // finalize
  // -------------------------------------------------------------------------

  private title(): string {
    return this.context.title ?? `Website performance report: ${formatRange(this.context.period.current)}`;
  }

  private finalize(state: RunState): ReportDocument {
    const generatedAt = (this.context.now ?? (() => new Date()))();
    const coverage = state.coverage;
    if (coverage === undefined || state.narrative === undefined) {
      throw new ReportError('Nothing to finalize: narrative was not validated', 'finalize');
    }

    const footer = buildFooter({
      resolver: new RegistryGroup(state.registries),
      coverage,
      period: this.context.period,
      generatedAt,
      omissions: state.omissions,
    });

    const parts = [`# ${this.title()}`];
    if (state.omissions.length > 0) {
      parts.push(omissionNotice(state.omissions));
    }
    parts.push(state.narrative.trim(), '## Source data', formatSections(state.sections), footer);

    return {
      ...this.baseDocument(state, generatedAt),
      markdown: parts.join('\n\n') + '\n',
      narrative: state.narrative,
      footer,
      coverage,
    };
  }

  private dryRunDocument(state: RunState): ReportDocument {
    const generatedAt = (this.context.now ?? (() => new Date()))();
    return {
      ...this.baseDocument(state, generatedAt),
      markdown: state.prompt + '\n',
    };
  }

  private baseDocument(state: RunState, generatedAt: Date): ReportDocument {
    return {
      title: this.title(),
      period: this.context.period,
      modelId: this.context.modelId,
      citationMode: this.context.citationMode,
      generatedAt: generatedAt.toISOString(),
      dryRun: this.context.dryRun ?? false,
      markdown: '',
      prompt: state.prompt,
      sections: state.sections,
      omissions: state.omissions,
      warnings: state.warnings,
      datasets: state.fetched.flatMap(f => f.datasets),
      usage: state.usage,
    };
  }
}

function omissionNotice(omissions: Omission[]): string {
  const lines = omissions.map(o => {
    const scope = o.dimension ? `${o.source}/${o.dimension}` : o.source;
    const when = o.period === CURRENT_PERIOD ? '' : ' (comparison period)';
    return `> - ${scope}${when}: ${o.reason}`;
  });
  return ['> **Incomplete data.** The following sections are missing from this report:', ...lines].join('\n');
}
