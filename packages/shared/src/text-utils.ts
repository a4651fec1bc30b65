export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();
