/** A clock that moves forward one second on every read */
export function steppingClock(start = '2026-01-01T09:00:00.000Z', stepMs = 1000): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

/** A clock that never moves */
export function frozenClock(at = '2026-01-01T09:00:00.000Z'): () => Date {
  return () => new Date(at);
}
