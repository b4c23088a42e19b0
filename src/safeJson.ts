/**
 * JSON parse for values read back from the local database. Corrupted rows and
 * well-formed JSON of the wrong shape both yield the fallback instead of throwing.
 */
export function safeParse<T>(raw: string | null | undefined, fallback: T, guard: (value: unknown) => value is T): T {
  if (raw == null || raw === '') return fallback;
  try {
    const parsed: unknown = JSON.parse(raw);
    return guard(parsed) ? parsed : fallback;
  } catch {
    return fallback;
  }
}
