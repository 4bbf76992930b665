// Minimal CSV tokenizer for instrument logs
// Handles double-quoted cells, doubled quotes, CR LF / LF line endings

const QUOTE = '"';
const COMMA = ',';

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;
  let i = 0;

  const endCell = () => {
    row.push(cell);
    cell = '';
  };
  const endRow = () => {
    endCell();
    rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === QUOTE) {
        if (text[i + 1] === QUOTE) {
          cell += QUOTE;
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += ch;
      }
      i += 1;
      continue;
    }

    if (ch === QUOTE && cell.trim() === '') {
      quoted = true;
      cell = '';
    } else if (ch === COMMA) {
      endCell();
    } else if (ch === '\r' && text[i + 1] === '\n') {
      endRow();
      i += 1;
    } else if (ch === '\n' || ch === '\r') {
      endRow();
    } else {
      cell += ch;
    }
    i += 1;
  }

  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

export function isBlankRow(row: string[]): boolean {
  return row.every(cell => cell.trim() === '');
}
