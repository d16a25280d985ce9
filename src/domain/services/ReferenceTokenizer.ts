import { sepaTagMarkers, type ReferenceField } from '../entities/ReferenceField.js';
import { parseDefaultSegment } from './DefaultSegmentParser.js';

// Word boundary as the bank's own tooling sees it: umlauts count as letters.
const tagMarker = /(?<![\p{L}\p{N}_])([A-Z]{3,4}\+) /gu;

const toTaggedField = (marker: string, value: string): ReferenceField => {
  const tag = sepaTagMarkers[marker];
  return tag ? { kind: 'sepa', tag, value } : { kind: 'unknown', marker, value };
};

const decodeDefault = (value: string): ReferenceField[] => {
  const { residual, fields } = parseDefaultSegment(value);
  return [...fields, { kind: 'default', value: residual }];
};

/**
 * Splits a normalized reference into its tagged segments. Text before the
 * first marker forms the `default` segment, which is decoded further.
 */
export const tokenizeReference = (reference: string): ReferenceField[] => {
  const fields: ReferenceField[] = [];
  let marker: string | null = null;
  let start = 0;

  const close = (end: number) => {
    const value = reference.slice(start, end).trim();
    fields.push(...(marker === null ? decodeDefault(value) : [toTaggedField(marker, value)]));
  };

  for (const match of reference.matchAll(tagMarker)) {
    const matchStart = match.index ?? 0;
    close(matchStart);
    start = matchStart + match[0].length;
    marker = match[1];
  }

  close(reference.length);

  return fields;
};
