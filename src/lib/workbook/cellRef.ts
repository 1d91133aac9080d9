/** Column letters of an A1 reference, upper-cased ("b12" -> "B"). */
export function columnLetter(ref: string): string {
  const m = ref.toUpperCase().match(/^([A-Z]+)\d*$/);
  if (!m) throw new RangeError(`Invalid cell reference '${ref}'`);
  return m[1];
}

/** 1-based column index ("A" -> 1, "AA" -> 27). */
export function columnIndex(letters: string): number {
  if (!/^[A-Za-z]+$/.test(letters))
    throw new RangeError(`Invalid column letters '${letters}'`);
  let idx = 0;
  for (const ch of letters.toUpperCase()) {
    idx = idx * 26 + (ch.charCodeAt(0) - 64);
  }
  return idx;
}

export function cellRef(column: string, row: number): string {
  return `${column.toUpperCase()}${row}`;
}

/** Column letters for a 1-based index (1 -> "A", 27 -> "AA"). */
export function columnName(index: number): string {
  if (!Number.isInteger(index) || index < 1)
    throw new RangeError(`Invalid column index ${index}`);
  let name = "";
  for (let n = index; n > 0; n = Math.floor((n - 1) / 26)) {
    name = String.fromCharCode(65 + ((n - 1) % 26)) + name;
  }
  return name;
}

/**
 * Column index of each cell in a row, given the cells' `r` attributes in
 * document order. A cell without a reference sits one column right of the
 * cell before it.
 */
export function rowColumnIndexes(refs: readonly (string | null)[]): number[] {
  let previous = 0;
  return refs.map((ref) => {
    previous = ref ? columnIndex(columnLetter(ref)) : previous + 1;
    return previous;
  });
}
