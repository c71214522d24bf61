const NOT_AVAILABLE = 'n/a';

/**
 * Turns a model-provided skill list into clean, de-duplicated entries.
 * Accepts either an array or a comma/semicolon separated string; "N/A" means none.
 */
export const cleanList = (value: unknown): string[] => {
  let entries: unknown[];

  if (Array.isArray(value)) {
    entries = value;
  } else if (typeof value === 'string') {
    entries = value.split(/[,;\n]/);
  } else {
    return [];
  }

  const seen = new Set<string>();
  const cleaned: string[] = [];

  for (const entry of entries) {
    if (typeof entry !== 'string') {
      continue;
    }

    const trimmed = entry.trim();
    const key = trimmed.toLowerCase();

    if (!trimmed || key === NOT_AVAILABLE || seen.has(key)) {
      continue;
    }

    seen.add(key);
    cleaned.push(trimmed);
  }

  return cleaned;
};
