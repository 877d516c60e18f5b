/**
 * A dense vector representation of some content.
 */
export class Embedding {
  readonly vector: number[];

  constructor(vector: number[]) {
    this.vector = vector;
  }

  static from(vector: ArrayLike<number>): Embedding {
    return new Embedding(Array.from(vector));
  }

  dimension(): number {
    return this.vector.length;
  }

  toFloat32Array(): Float32Array {
    return Float32Array.from(this.vector);
  }
}
