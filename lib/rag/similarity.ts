// lib/rag/similarity.ts

export const dot = (a: number[], b: number[]) => {
  let s = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) s += a[i] * b[i];
  return s;
};

export const norm = (a: number[]) => Math.sqrt(dot(a, a));

/** Unit-length copy of `a`; a zero vector comes back unchanged. */
export const normalize = (a: number[]): number[] => {
  const n = norm(a);
  return n > 0 ? a.map((x) => x / n) : a.slice();
};

export const cosine = (a: number[], b: number[]) => {
  const na = norm(a);
  const nb = norm(b);
  return na && nb ? dot(a, b) / (na * nb) : 0;
};
