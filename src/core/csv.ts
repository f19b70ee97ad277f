/**
 * Minimal CSV codec for task export and import.
 *
 * Fields containing the delimiter, a quote, or a line break are quoted,
 * with inner quotes doubled. The parser accepts the same dialect plus CRLF
 * line endings.
 */

export function escapeField(value: string, delimiter = ','): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

/** Header line plus one line per row, values looked up by header name. */
export function toCsv(headers: readonly string[], rows: readonly Record<string, string>[], delimiter = ','): string {
  const lines = [headers.map((h) => escapeField(h, delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(headers.map((h) => escapeField(row[h] ?? '', delimiter)).join(delimiter));
  }
  return lines.join('\n') + '\n';
}

/** Split CSV text into records of raw fields. */
export function parseCsvRecords(text: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let fieldValue = '';
  let quoted = false;
  let i = 0;

  const endField = () => {
    record.push(fieldValue);
    fieldValue = '';
  };
  const endRecord = () => {
    endField();
    // blank lines carry no data
    if (!(record.length === 1 && record[0] === '')) records.push(record);
    record = [];
  };

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          fieldValue += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        fieldValue += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && fieldValue === '') {
      quoted = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\n') {
      endRecord();
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRecord();
    } else {
      fieldValue += ch;
    }
    i++;
  }

  if (fieldValue !== '' || record.length > 0) endRecord();
  return records;
}

/**
 * Parse CSV with a header line into objects keyed by header name.
 * Short rows are padded with empty strings; extra fields are dropped.
 */
export function parseCsv(text: string, delimiter = ','): Record<string, string>[] {
  const [headers, ...rows] = parseCsvRecords(text.replace(/^\uFEFF/, ''), delimiter);
  if (!headers) return [];
  const names = headers.map((h) => h.trim());
  return rows.map((fields) => {
    const row: Record<string, string> = {};
    names.forEach((name, index) => {
      row[name] = fields[index] ?? '';
    });
    return row;
  });
}
