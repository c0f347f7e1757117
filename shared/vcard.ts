import type { ContactRecord } from './types.js';

/**
 * Escape a value for a vCard 3.0 text property: backslash, comma and
 * semicolon get a backslash; every line break becomes a literal `\n`.
 */
export function escapeVCardValue(value: string): string {
  return value
    .replace(/[\\,;]/g, m => `\\${m}`)
    .replace(/\r\n|\r|\n/g, '\\n');
}

export function renderCard(record: ContactRecord): string {
  const lines = [
    'BEGIN:VCARD',
    'VERSION:3.0',
    `EMAIL:${escapeVCardValue(record.email)}`,
    `TEL;TYPE=cell,voice:${escapeVCardValue(record.phone)}`,
    `FN:${escapeVCardValue(record.firstName)} ${escapeVCardValue(record.lastName)}`,
    'END:VCARD',
  ];
  return lines.map(l => `${l}\n`).join('');
}

export function renderDocument(records: ContactRecord[]): string {
  return records.map(renderCard).join('');
}
