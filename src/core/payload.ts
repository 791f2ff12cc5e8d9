/**
 * Tags from a checklist result such as `"item1" "item3"`, in order.
 * Text outside double quotes is ignored.
 */
export function parseQuotedTags(payload: string): string[] {
  const tags: string[] = [];
  for (const match of payload.matchAll(/"([^"]*)"/g)) {
    tags.push(match[1] ?? '');
  }
  return tags;
}

/**
 * Tags from a `--separate-output` result, one per line.
 */
export function parseSeparatedTags(payload: string): string[] {
  return payload.split(/\r?\n/).filter(line => line.length > 0);
}
