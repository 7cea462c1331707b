export function parseSize(size: string | number | undefined): number | undefined {
  if (size === undefined) return undefined;
  const value = typeof size === "number" ? size : Number.parseFloat(size);
  return Number.isFinite(value) ? value : undefined;
}

export function parseDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
