export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/** Unset or blank gives the fallback; anything but a whole number >= minimum throws. */
export function parseInteger(
  value: string | undefined,
  fallback: number,
  name: string,
  minimum = 0,
): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new Error(`${name} must be an integer >= ${minimum}, got "${value}"`);
  }
  return parsed;
}

export function parseCorsOrigins(value: string | undefined): string[] | '*' {
  const raw = (value || '').trim();
  if (!raw || raw === '*') {
    return '*';
  }
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
