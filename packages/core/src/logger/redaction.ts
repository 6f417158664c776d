/**
 * Log redaction paths for lead data
 *
 * Paths are listed one by one rather than by wildcard. A new PII field on the
 * lead record needs its own entry here.
 */

export const REDACTION_PATHS: string[] = [
  // Contact profile, bare or nested in a record
  'contactEmail',
  'contactName',
  'contact.contactEmail',
  'contact.contactName',
  'record.contact.contactEmail',
  'record.contact.contactName',
  'profile.contactEmail',
  'profile.contactName',

  // Outreach content
  'body',
  'draft.body',
  'record.draft.body',
  'message.body',
  'message.to',

  // Inbound replies
  'replyText',
  'reply.text',
  'record.reply.text',

  // Call transcripts
  'transcript',
  'notableQuotes',

  // Credentials
  'password',
  'connectionString',
  'req.headers.authorization',
];

/**
 * Replace a redacted value with a marker naming the field
 */
export function createCensor(_value: unknown, path: string[]): string {
  return `[REDACTED:${path[path.length - 1] ?? 'unknown'}]`;
}
