import { DBContext } from './db/client.js';
import { getSettings } from './db/settings.js';
import { KBConfig } from './config.js';
import { errorMessage } from './errors.js';
import { runBuild } from './ingest/pipeline.js';
import { KeywordAnchor, QueryAnchor, noopAnchor } from './retrieval/anchoring.js';
import { Encoder, createEncoder } from './retrieval/embeddings.js';
import { selectContext } from './retrieval/ranking.js';
import { Retriever, SearchOutcome } from './retrieval/search.js';
import { CorpusSnapshot, artifactsExist, loadArtifacts } from './retrieval/store.js';
import { AnswerGenerator, createGenerator } from './retrieval/synthesize.js';
import { SearchResult } from './types.js';

export interface KnowledgeBaseOptions {
  config: KBConfig;
  ctx: DBContext;
  encoder?: Encoder;
  generator?: AnswerGenerator;
  anchor?: QueryAnchor;
}

export function noResultsMessage(institution: string): string {
  return `I couldn't find relevant information about that topic. Please contact ${institution} directly for more details.`;
}

export function fallbackAnswer(institution: string): string {
  return [
    `Hello! I'm here to help you learn about ${institution}. 🎓`,
    '',
    `${institution} is an engineering institution offering undergraduate and postgraduate programs in engineering and technology.`,
    '',
    'Feel free to ask me about programs, admissions, facilities, or any other aspect of the college!'
  ].join('\n');
}

/**
 * Owns the encoder, the loaded corpus snapshot and the answer generator for
 * one process. Construct once at startup and hand the instance to callers.
 */
export class KnowledgeBase {
  readonly config: KBConfig;
  readonly encoder: Encoder;
  readonly retriever: Retriever;
  private readonly ctx: DBContext;
  private readonly generator: AnswerGenerator;
  private readonly anchor: QueryAnchor;
  private initializing: Promise<void> | null = null;

  constructor(options: KnowledgeBaseOptions) {
    this.config = options.config;
    this.ctx = options.ctx;
    this.encoder = options.encoder ?? createEncoder(options.config);
    this.generator = options.generator ?? createGenerator(options.config);
    this.anchor = options.anchor ?? new KeywordAnchor(options.config.anchorPhrase, options.config.anchorKeywords);
    this.retriever = new Retriever({ encoder: this.encoder, anchor: this.anchor });
  }

  get isReady(): boolean {
    return this.retriever.current !== null;
  }

  get snapshot(): CorpusSnapshot | null {
    return this.retriever.current;
  }

  /**
   * Loads the persisted artifacts, building them first when they are absent
   * and auto-build is on. Safe to call repeatedly; concurrent callers share
   * one load. A failed load can be retried.
   */
  initialize(): Promise<void> {
    if (this.isReady) return Promise.resolve();
    if (!this.initializing) {
      this.initializing = this.load().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async load(): Promise<void> {
    const dir = this.config.vectorstoreDir;
    if (!artifactsExist(dir) && this.config.autoBuild) {
      console.log(`[kb] Artifacts not found in ${dir}; building from ${this.config.dataDir}`);
      const report = await runBuild(this.ctx, { config: this.config, encoder: this.encoder });
      console.log(report.summary);
    }
    // raises ArtifactMissingError naming the first absent file
    const snapshot = loadArtifacts(dir, this.encoder.modelId);
    this.retriever.swap(snapshot);
    console.log(`[kb] Loaded build ${snapshot.buildId} with ${snapshot.chunks.length} chunks`);
  }

  /** Loads a fresh build from disk and swaps it in whole; the old snapshot keeps serving if loading fails. */
  reload(): CorpusSnapshot {
    const snapshot = loadArtifacts(this.config.vectorstoreDir, this.encoder.modelId);
    this.retriever.swap(snapshot);
    return snapshot;
  }

  private activeAnchor(): QueryAnchor {
    return getSettings(this.ctx).anchoringEnabled ? this.anchor : noopAnchor;
  }

  searchDetailed(query: string, k = getSettings(this.ctx).topK): Promise<SearchOutcome> {
    return this.retriever.searchDetailed(query, k, this.activeAnchor());
  }

  search(query: string, k = getSettings(this.ctx).topK): Promise<SearchResult[]> {
    return this.retriever.search(query, k, this.activeAnchor());
  }

  contextFor(results: SearchResult[]): SearchResult[] {
    return selectContext(results, getSettings(this.ctx).relevanceThreshold, this.config.fallbackContextCount);
  }

  /** Always resolves to a displayable answer; failures degrade to a static message. */
  async queryKnowledgeBase(query: string): Promise<string> {
    const institution = this.config.anchorPhrase;
    try {
      await this.initialize();
    } catch (error) {
      console.error(`[kb] Initialization failed: ${errorMessage(error)}`);
      return fallbackAnswer(institution);
    }

    try {
      const results = await this.search(query);
      if (results.length === 0) return noResultsMessage(institution);
      const answer = await this.generator.generate(query, this.contextFor(results));
      return answer.trim() || fallbackAnswer(institution);
    } catch (error) {
      console.error(`[kb] Answer generation failed: ${errorMessage(error)}`);
      return fallbackAnswer(institution);
    }
  }
}
