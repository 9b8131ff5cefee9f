import { CorpusStats } from '../types.js';

export function buildCorpusSummary(buildId: string, modelId: string, dimension: number, stats: CorpusStats): string {
  return [
    `✅ Built corpus ${buildId}`,
    `Records: ${stats.recordsSeen} (${stats.recordsSkipped} too short, ${stats.recordsFailed} failed)`,
    `Chunks: ${stats.chunkCount}`,
    `Average chunk length: ${stats.avgChunkLength.toFixed(1)} characters`,
    `Encoder: ${modelId} (${dimension} dims)`,
    'Index: flat L2 (squared Euclidean distance)'
  ].join('\n');
}
