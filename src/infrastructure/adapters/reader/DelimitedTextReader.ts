import iconv from 'iconv-lite';
import Papa from 'papaparse';
import type { JsonValue, RawRecord } from '../../../domain/entities/Transaction.js';
import { DecodeError } from '../../../domain/errors/IngestionErrors.js';

export const PRIMARY_ENCODING = 'utf-8';
export const FALLBACK_ENCODING = 'windows-1251';

const REPLACEMENT_CHARACTER = '\uFFFD';

const decodeUtf8 = (bytes: Uint8Array): string | null => {
  try {
    return new TextDecoder(PRIMARY_ENCODING, { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
};

// windows-1251 has no U+FFFD of its own, so one in the output marks an unmapped byte.
const decodeLegacy = (bytes: Uint8Array): string | null => {
  const text = iconv.decode(Buffer.from(bytes), FALLBACK_ENCODING);
  return text.includes(REPLACEMENT_CHARACTER) ? null : text;
};

export const decodeText = (bytes: Uint8Array): string => {
  const text = decodeUtf8(bytes) ?? decodeLegacy(bytes);

  if (text === null) {
    throw new DecodeError(`Input is neither valid ${PRIMARY_ENCODING} nor ${FALLBACK_ENCODING}`, {
      byteLength: bytes.byteLength,
    });
  }

  return text;
};

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || value === '' || (Array.isArray(value) && value.every(isBlank));

export const parseDelimitedText = (text: string): RawRecord[] => {
  const result = Papa.parse<Record<string, string | string[] | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const records: RawRecord[] = [];

  for (const row of result.data) {
    const values = Object.values(row);
    if (values.every(isBlank)) {
      continue;
    }

    const record: RawRecord = {};
    for (const [key, value] of Object.entries(row)) {
      if (value !== undefined) {
        const cell: JsonValue = value;
        record[key] = cell;
      }
    }

    records.push(record);
  }

  return records;
};

/** Decodes an uploaded export and yields one record per non-blank row, keyed by the header. */
export const readDelimitedText = (bytes: Uint8Array): RawRecord[] => parseDelimitedText(decodeText(bytes));
