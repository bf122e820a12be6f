export const CSV_DELIMITER = ','
export const CSV_QUOTE = '"'
export const CSV_LINE_TERMINATOR = '\r\n'

const NEEDS_QUOTING = /[",\r\n]/

/** Minimal quoting: only fields holding a delimiter, quote or line break are quoted, quotes doubled. */
export function encodeCsvField(field: string): string {
    if (!NEEDS_QUOTING.test(field)) return field
    return `${CSV_QUOTE}${field.replaceAll(CSV_QUOTE, CSV_QUOTE + CSV_QUOTE)}${CSV_QUOTE}`
}

export function encodeCsvRow(fields: readonly string[]): string {
    return fields.map(encodeCsvField).join(CSV_DELIMITER) + CSV_LINE_TERMINATOR
}
