const ELLIPSIS = '...';

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

/**
 * Cuts `text` to at most `limit` characters, ending in "...".
 * Prefers the last space when it falls inside the final 20% of the limit;
 * otherwise cuts mid-word. Never splits a surrogate pair.
 */
export const truncateAtWordBoundary = (text: string, limit: number): string => {
  if (text.length <= limit) return text;
  if (limit <= ELLIPSIS.length) return ELLIPSIS.slice(0, Math.max(0, limit));

  let cut = text.slice(0, limit - ELLIPSIS.length);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > limit * 0.8) {
    cut = cut.slice(0, lastSpace);
  } else if (isHighSurrogate(cut.charCodeAt(cut.length - 1))) {
    cut = cut.slice(0, -1);
  }
  return cut + ELLIPSIS;
};

export const collapseWhitespace = (text: string): string => text.split(/\s+/).filter(Boolean).join(' ');

/** Compact duration for short messages: 7200 → "2h", 300 → "5m", 45 → "45s". */
export const formatCompactDuration = (seconds: number): string => {
  const s = Math.max(0, Math.floor(seconds));
  if (s > 3600) return `${Math.floor(s / 3600)}h`;
  if (s > 60) return `${Math.floor(s / 60)}m`;
  return `${s}s`;
};

/** Longer form for email bodies: 3900 → "1h 5m", 125 → "2m", 30 → "30s". */
export const formatDuration = (seconds: number): string => {
  const s = Math.max(0, Math.floor(seconds));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  if (h > 0) return m > 0 ? `${h}h ${m}m` : `${h}h`;
  if (m > 0) return `${m}m`;
  return `${s}s`;
};
