import path from 'node:path';

export interface KBSettings {
  anchoringEnabled: boolean;
  relevanceThreshold: number;
  topK: number;
}

export interface KBConfig {
  dataDir: string;
  vectorstoreDir: string;
  dbPath: string;
  autoBuild: boolean;
  chunkSize: number;
  chunkOverlap: number;
  minContentChars: number;
  previewChars: number;
  defaultUrl: string;
  defaultSection: string;
  anchorPhrase: string;
  anchorKeywords: string[];
  fallbackContextCount: number;
  maxPromptChunks: number;
  embeddingDims: number;
  embeddingBatchSize: number;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  groqApiKey: string | null;
  groqModel: string;
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  return raw.toLowerCase() === 'true';
}

function envList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const items = raw.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: Env = process.env): KBConfig {
  const cwd = process.cwd();
  return {
    dataDir: path.resolve(cwd, env.KB_DATA_DIR || 'data'),
    vectorstoreDir: path.resolve(cwd, env.KB_VECTORSTORE_DIR || 'vectorstore'),
    dbPath: env.KB_DB_PATH === ':memory:' ? ':memory:' : path.resolve(cwd, env.KB_DB_PATH || path.join('data', 'kb.sqlite')),
    autoBuild: envBool(env, 'KB_AUTO_BUILD', false),
    chunkSize: envNumber(env, 'KB_CHUNK_SIZE', 600),
    chunkOverlap: envNumber(env, 'KB_CHUNK_OVERLAP', 150),
    minContentChars: 30,
    previewChars: 150,
    defaultUrl: env.KB_DEFAULT_URL?.trim() || 'https://kct.ac.in',
    defaultSection: 'General',
    anchorPhrase: env.KB_ANCHOR_PHRASE?.trim() || 'Kumaraguru College of Technology',
    anchorKeywords: envList(env, 'KB_ANCHOR_KEYWORDS', ['KCT', 'Kumaraguru', 'College', 'Technology']),
    fallbackContextCount: 3,
    maxPromptChunks: 3,
    embeddingDims: envNumber(env, 'EMBEDDING_DIMS', 384),
    embeddingBatchSize: Math.max(1, envNumber(env, 'KB_EMBEDDING_BATCH_SIZE', 64)),
    openaiApiKey: env.OPENAI_API_KEY?.trim() || null,
    openaiEmbeddingModel: env.OPENAI_EMBEDDING_MODEL?.trim() || 'text-embedding-3-small',
    groqApiKey: env.GROQ_API_KEY?.trim() || null,
    groqModel: env.GROQ_MODEL?.trim() || 'llama-3.1-8b-instant'
  };
}

export function loadDefaultSettings(env: Env = process.env): KBSettings {
  const threshold = envNumber(env, 'KB_RELEVANCE_THRESHOLD', 0.3);
  const topK = Math.floor(envNumber(env, 'KB_TOP_K', 5));
  return {
    anchoringEnabled: envBool(env, 'KB_ANCHORING_ENABLED', true),
    relevanceThreshold: threshold >= 0 && threshold <= 1 ? threshold : 0.3,
    topK: topK > 0 ? topK : 5
  };
}

export const DEFAULT_SETTINGS: KBSettings = loadDefaultSettings();
