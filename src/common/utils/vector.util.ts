import { DimensionMismatchError } from '../errors/skyvision.errors';

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
  if (norm === 0 || !Number.isFinite(norm)) {
    return vector.slice();
  }
  return vector.map((x) => x / norm);
}

export function assertDimension(vector: number[], expected: number, where: string): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length, where);
  }
}

/**
 * Serialize to the text form accepted by MariaDB's VEC_FromText, e.g.
 * `[0.1,-0.2,0]`. Non-finite components become 0.
 */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.map((x) => (Number.isFinite(x) ? x : 0)).join(',')}]`;
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((x) => typeof x === 'number');
}
