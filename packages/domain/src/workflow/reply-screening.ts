/**
 * Inbound reply screening
 *
 * Filters out replies that are not a human answer to the outreach: empty
 * bodies, placeholder values, auto-responders and share/access notifications.
 */

const PLACEHOLDER_REPLIES: ReadonlySet<string> = new Set(['', 'none', 'null', 'no reply']);

const AUTOMATED_MARKERS: readonly string[] = [
  'drive.google.com',
  'no-reply',
  'automated message',
  'requests access',
];

export function isMeaningfulReply(text: string | null | undefined): boolean {
  if (typeof text !== 'string') return false;

  const normalized = text.trim().toLowerCase();
  if (PLACEHOLDER_REPLIES.has(normalized)) return false;

  return !AUTOMATED_MARKERS.some((marker) => normalized.includes(marker));
}
