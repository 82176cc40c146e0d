// ---------------------------------------------------------------------------
// Delimited text helpers shared by claim ingestion and report exports
// ---------------------------------------------------------------------------

const DELIMITER_CANDIDATES = ['\t', ',', '|'] as const;

/** Pick the most frequent of tab, comma and pipe in the header line. Comma when none appear. */
export function detectDelimiter(firstLine: string): string {
  const candidates = DELIMITER_CANDIDATES.map((char) => ({
    char,
    count: firstLine.split(char).length - 1,
  }));
  candidates.sort((a, b) => b.count - a.count);
  return candidates[0].count > 0 ? candidates[0].char : ',';
}

/**
 * Split delimited content into trimmed fields. Handles double-quoted fields
 * with "" escapes. Blank lines are dropped; quoted fields do not span lines.
 */
export function parseRows(content: string, delimiter: string): string[][] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  return lines.map((line) => {
    const fields: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (inQuotes) {
        if (ch === '"' && line[i + 1] === '"') {
          current += '"';
          i++;
        } else if (ch === '"') {
          inQuotes = false;
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuotes = true;
      } else if (ch === delimiter) {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
    fields.push(current.trim());
    return fields;
  });
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Header line plus one line per row, newline-terminated. */
export function toCsv(headers: readonly string[], rows: readonly string[][]): string {
  const lines = [headers, ...rows].map((fields) =>
    fields.map(escapeCsvField).join(','),
  );
  return `${lines.join('\n')}\n`;
}
