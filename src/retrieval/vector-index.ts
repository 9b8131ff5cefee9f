import { ArtifactMismatchError, DimensionMismatchError, IndexNotBuiltError } from '../errors.js';
import { Neighbor } from '../types.js';

const MAGIC = 'KBVI';
const FORMAT_VERSION = 1;

/**
 * Exact nearest-neighbour index over squared Euclidean distance. Vectors are
 * addressed by ordinal only; text and metadata live elsewhere.
 */
export class FlatL2Index {
  private data: Float32Array | null = null;
  private dim = 0;
  private count = 0;

  get isBuilt(): boolean {
    return this.data !== null;
  }

  get size(): number {
    return this.count;
  }

  get dimension(): number {
    return this.dim;
  }

  build(vectors: number[][], dimension?: number): this {
    const dim = vectors[0]?.length ?? dimension ?? 0;
    if (dimension !== undefined && dim !== dimension) {
      throw new DimensionMismatchError(dimension, dim);
    }
    const data = new Float32Array(vectors.length * dim);
    vectors.forEach((vec, ordinal) => {
      if (vec.length !== dim) throw new DimensionMismatchError(dim, vec.length);
      data.set(vec, ordinal * dim);
    });
    this.data = data;
    this.dim = dim;
    this.count = vectors.length;
    return this;
  }

  search(query: ArrayLike<number>, k: number): Neighbor[] {
    const data = this.data;
    if (!data) throw new IndexNotBuiltError();
    if (this.count === 0) return [];
    if (query.length !== this.dim) throw new DimensionMismatchError(this.dim, query.length);

    const limit = Math.min(Math.max(0, Math.floor(k)), this.count);
    if (limit === 0) return [];

    const scored: Neighbor[] = [];
    for (let ordinal = 0; ordinal < this.count; ordinal++) {
      const offset = ordinal * this.dim;
      let distance = 0;
      for (let j = 0; j < this.dim; j++) {
        const d = data[offset + j] - query[j];
        distance += d * d;
      }
      scored.push({ ordinal, distance });
    }

    return scored.sort((a, b) => a.distance - b.distance || a.ordinal - b.ordinal).slice(0, limit);
  }

  serialize(buildId: string): Buffer {
    const data = this.data;
    if (!data) throw new IndexNotBuiltError();
    const id = Buffer.from(buildId, 'utf8');
    const header = Buffer.alloc(4 + 1 + 4 + 4 + 2);
    header.write(MAGIC, 0, 'ascii');
    header.writeUInt8(FORMAT_VERSION, 4);
    header.writeUInt32LE(this.dim, 5);
    header.writeUInt32LE(this.count, 9);
    header.writeUInt16LE(id.length, 13);
    const body = Buffer.alloc(data.length * 4);
    data.forEach((value, i) => body.writeFloatLE(value, i * 4));
    return Buffer.concat([header, id, body]);
  }

  static deserialize(buf: Buffer): { index: FlatL2Index; buildId: string } {
    if (buf.length < 15 || buf.toString('ascii', 0, 4) !== MAGIC) {
      throw new ArtifactMismatchError('Not a vector index file');
    }
    const version = buf.readUInt8(4);
    if (version !== FORMAT_VERSION) {
      throw new ArtifactMismatchError(`Unsupported vector index version ${version}`);
    }
    const dim = buf.readUInt32LE(5);
    const count = buf.readUInt32LE(9);
    const idLength = buf.readUInt16LE(13);
    const bodyStart = 15 + idLength;
    if (buf.length !== bodyStart + dim * count * 4) {
      throw new ArtifactMismatchError('Vector index file is truncated or corrupt');
    }
    const buildId = buf.toString('utf8', 15, bodyStart);

    const data = new Float32Array(dim * count);
    for (let i = 0; i < data.length; i++) data[i] = buf.readFloatLE(bodyStart + i * 4);

    const index = new FlatL2Index();
    index.data = data;
    index.dim = dim;
    index.count = count;
    return { index, buildId };
  }
}
