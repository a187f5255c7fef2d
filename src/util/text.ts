const IDEOGRAPHIC_SPACE = /\u3000/g;

// trims, collapses whitespace and turns full-width spaces into half-width ones
export function normalizeText(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }

  const normalized = text
    .replace(IDEOGRAPHIC_SPACE, " ")
    .replace(/\s+/g, " ")
    .trim();

  return normalized ? normalized : null;
}

export function normalizeAddress(address: string): string {
  return (normalizeText(address) ?? "").toLowerCase();
}

export function extractPhoneNumber(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }

  const patterns = [/\d{2,4}[-(]?\d{2,4}[-)]?\d{3,4}/, /\d{10,11}/];

  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      return match[0];
    }
  }

  return null;
}

export function extractPostalCode(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }

  const match = text.match(/\d{3}-?\d{4}/);
  if (!match) {
    return null;
  }

  const postal = match[0];
  return postal.includes("-") ? postal : `${postal.slice(0, 3)}-${postal.slice(3)}`;
}

export function truncateText(text: string, maxLength = 100, suffix = "...") {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - suffix.length) + suffix;
}
