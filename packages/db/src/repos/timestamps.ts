/** pg hands back timestamptz columns as Date; fakes and JSON hand back strings. */
export function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toIsoOrUndefined(value: Date | string | null): string | undefined {
  return value === null ? undefined : toIso(value);
}
