import { DBContext } from './client.js';
import { DEFAULT_SETTINGS, KBSettings } from '../config.js';
import { errorMessage } from '../errors.js';

const SETTINGS_KEY = 'kb_settings_v1';

function sanitize(settings: Record<string, unknown>): KBSettings {
  const threshold = Number(settings.relevanceThreshold);
  const topK = Math.floor(Number(settings.topK));
  return {
    anchoringEnabled: typeof settings.anchoringEnabled === 'boolean' ? settings.anchoringEnabled : DEFAULT_SETTINGS.anchoringEnabled,
    relevanceThreshold: Number.isFinite(threshold) && threshold >= 0 && threshold <= 1 ? threshold : DEFAULT_SETTINGS.relevanceThreshold,
    topK: Number.isFinite(topK) && topK > 0 ? topK : DEFAULT_SETTINGS.topK
  };
}

export function getSettings(ctx: DBContext): KBSettings {
  const row = ctx.db.prepare('SELECT value_json FROM settings WHERE key = ?').get(SETTINGS_KEY) as { value_json: string } | undefined;
  if (!row) return { ...DEFAULT_SETTINGS };
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.value_json);
  } catch (error) {
    console.warn(`[settings] Ignoring unreadable settings row: ${errorMessage(error)}`);
    return { ...DEFAULT_SETTINGS };
  }
  return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? sanitize({ ...DEFAULT_SETTINGS, ...parsed }) : { ...DEFAULT_SETTINGS };
}

export function updateSettings(ctx: DBContext, patch: Partial<KBSettings>): KBSettings {
  const next = sanitize({ ...getSettings(ctx), ...patch });
  ctx.db
    .prepare(
      `INSERT INTO settings (key, value_json, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = CURRENT_TIMESTAMP`
    )
    .run(SETTINGS_KEY, JSON.stringify(next));
  return next;
}

export type ParsedSetting = { ok: true; patch: Partial<KBSettings> } | { ok: false; error: string };

const BOOLEAN_WORDS = new Map<string, boolean>([
  ['true', true],
  ['on', true],
  ['false', false],
  ['off', false]
]);

/** Validates one textual setting value from the CLI or a chat command. */
export function parseSetting(key: string, raw: string): ParsedSetting {
  const value = raw.trim();
  if (key === 'anchoringEnabled') {
    const flag = BOOLEAN_WORDS.get(value.toLowerCase());
    return flag === undefined ? { ok: false, error: 'anchoringEnabled must be true or false.' } : { ok: true, patch: { anchoringEnabled: flag } };
  }
  if (key === 'relevanceThreshold') {
    const threshold = Number(value);
    if (!value || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      return { ok: false, error: 'Threshold must be a number between 0 and 1.' };
    }
    return { ok: true, patch: { relevanceThreshold: threshold } };
  }
  if (key === 'topK') {
    const topK = Number(value);
    if (!value || !Number.isInteger(topK) || topK <= 0) return { ok: false, error: 'topk must be a positive integer.' };
    return { ok: true, patch: { topK } };
  }
  return { ok: false, error: `Unknown setting: ${key}` };
}
