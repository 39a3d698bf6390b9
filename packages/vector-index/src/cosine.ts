/**
 * Cosine distance `1 - cos(a, b)`, clamped to [0, 2]. A zero vector has no
 * direction and sits at distance 1 from everything.
 */
export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    magA += x * x;
    magB += y * y;
  }

  const denominator = Math.sqrt(magA) * Math.sqrt(magB);
  const similarity = denominator === 0 ? 0 : dot / denominator;

  return Math.min(2, Math.max(0, 1 - similarity));
}
