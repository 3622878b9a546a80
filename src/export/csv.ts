export type CsvCell = string | number | bigint | boolean | null | undefined;

const NEEDS_QUOTES = /[",\r\n]/;

export function csvField(value: CsvCell): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** One CSV line terminated by CRLF. */
export function csvRow(cells: readonly CsvCell[]): string {
    return cells.map(csvField).join(',') + '\r\n';
}

/** `dd/MM/yyyy HH:mm:ss` in UTC. */
export function formatCsvDate(date: Date): string {
    if (Number.isNaN(date.getTime())) return '';
    const pad = (n: number, width: number = 2) => String(n).padStart(width, '0');
    return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCFullYear(), 4)} `
        + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
