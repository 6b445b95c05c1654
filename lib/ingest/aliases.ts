// Header normalization and alias resolution for source CSV quirks

export const COLUMN_ALIASES: Record<string, string> = {
  atmo_opacity: "atmospheric_opacity",
  date: "terrestrial_date",
  earth_date: "terrestrial_date",
};

// Aliases are looked up after normalization, so matching is case-insensitive
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

