/** "  abu dhabi " -> "Abu Dhabi", "AL-ULA" -> "Al-Ula". */
export function toTitleCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}
