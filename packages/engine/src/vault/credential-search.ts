/**
 * Credential search
 * Linear predicate scan over the decrypted collection; there is no index.
 */

import type { CredentialPredicate, CredentialQuery, CredentialRecord } from '../types';

/**
 * Fields matched by a free-text query
 */
function searchableText(record: Readonly<CredentialRecord>): string[] {
  const fields = [record.serviceName, record.username];
  if (record.url) fields.push(record.url);
  if (record.notes) fields.push(record.notes);
  return fields;
}

/**
 * Build a predicate from a query.
 * The text query matches case-insensitively as a substring of service name,
 * username, url or notes; tags match when the record carries any of them.
 * An empty query matches everything.
 */
export function buildSearchPredicate(query: CredentialQuery): CredentialPredicate {
  const text = query.query?.trim().toLowerCase() ?? '';
  const tags = (query.tags ?? []).map(tag => tag.trim().toLowerCase()).filter(tag => tag.length > 0);

  return record => {
    if (text.length > 0) {
      const hit = searchableText(record).some(field => field.toLowerCase().includes(text));
      if (!hit) return false;
    }

    if (tags.length > 0) {
      const recordTags = record.tags.map(tag => tag.toLowerCase());
      if (!tags.some(tag => recordTags.includes(tag))) return false;
    }

    return true;
  };
}

/**
 * Sort by service name, then username
 */
export function sortCredentials(records: CredentialRecord[]): CredentialRecord[] {
  return [...records].sort(
    (a, b) => a.serviceName.localeCompare(b.serviceName) || a.username.localeCompare(b.username)
  );
}
