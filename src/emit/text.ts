// Casing helpers for section headings

/** 首字母大写，其余小写（"SEGMENTATION" → "Segmentation"）。 */
export function capitalize(value: string): string {
  if (value.length === 0) return value;
  const [first = '', ...rest] = Array.from(value);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

/** 每个字母连续段首字母大写（"tone and word-accent" → "Tone And Word-Accent"）。 */
export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, word => capitalize(word));
}
