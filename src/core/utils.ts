export function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function tailText(text: string, maxChars = 4000): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  return `...${trimmed.slice(trimmed.length - maxChars)}`;
}
