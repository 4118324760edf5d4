const NEWSDATA_FORMAT = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;
const ISO_WITHOUT_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Publication time of a feed item: ISO-8601, NewsData's
 * `YYYY-MM-DD HH:MM:SS` or an RFC 2822 date. Times without a zone are UTC;
 * anything unparseable becomes `fallback`.
 */
export function parsePublishedAt(value: string | null | undefined, fallback: Date): Date {
  const text = value?.trim();
  if (!text) return fallback;

  let normalized = text;
  if (NEWSDATA_FORMAT.test(text)) {
    normalized = `${text.replace(' ', 'T')}Z`;
  } else if (ISO_WITHOUT_ZONE.test(text)) {
    normalized = `${text}Z`;
  }

  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? fallback : new Date(parsed);
}
