/** "phase_a" -> "Phase A", "reference model" -> "Reference Model". */
export function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function countNonWhitespace(text: string): number {
  return text.replace(/\s/g, '').length;
}
