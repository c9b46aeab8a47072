/**
 * Resource bar for the terminal, e.g. `[#######...] 70/100`.
 */
export function displayBar(current: number, maximum: number, width = 20): string {
  const ratio = maximum > 0 ? Math.max(0, Math.min(1, current / maximum)) : 0;
  const filled = Math.floor(ratio * width);
  return `[${'#'.repeat(filled)}${'.'.repeat(width - filled)}] ${current}/${maximum}`;
}

/** `ashen_key` → `Ashen Key` */
export function titleCase(id: string): string {
  return id
    .split(/[_\s]+/)
    .filter((w) => w.length > 0)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(' ');
}

export function normalizeName(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
}

/** Case-insensitive name/id match used by every "verb <target>" command. */
export function matchesName(query: string, candidate: { id: string; name: string }): boolean {
  const q = normalizeName(query);
  if (q.length === 0) return false;
  return (
    normalizeName(candidate.name) === q ||
    normalizeName(candidate.id) === q ||
    normalizeName(candidate.name).includes(q)
  );
}
