/**
 * Writes the navigations of an SNSS file as CSV: one table per tab and one
 * form state table per navigation that carries decoded form state.
 */
import * as fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import type { NavigationEntry, SessionHeader } from '../snss-types.js';
import type { SnssDecoderOptions } from '../snss/types.js';
import { SnssDecoder } from '../snss/session-file.js';
import { flattenFrames } from '../snss/frame-state.js';
import { formatTransition } from '../snss/transition.js';
import { csvRow, formatCsvDate } from './csv.js';
import type { CsvCell } from './csv.js';

export const TAB_CSV_HEADER = [
    'Index', 'Title', 'URL', 'Timestamp', 'Transition Type', 'Referrer',
    'Search Terms', 'HTTP Status Code', 'Page State',
] as const;

export const PAGE_STATE_CSV_HEADER = ['Form ID', 'Key', 'Type', 'Value'] as const;

export interface ExportSummary {
    header: SessionHeader;
    /** Tab ids in first-seen order. */
    tabs: number[];
    navigations: number;
    pageStateFiles: string[];
}

export function tabFileName(tabId: number): string {
    return `tab${tabId}.csv`;
}

export function pageStateFileName(tabId: number, navigationIndex: number | null): string {
    return `tab${tabId}-navigation${navigationIndex ?? 'unknown'} page_state.csv`;
}

/** Form state rows of every frame in the entry, main frame first. */
export function pageStateRows(entry: NavigationEntry): CsvCell[][] {
    const rows: CsvCell[][] = [];
    if (entry.pageState?.kind !== 'versioned') return rows;
    for (const frame of flattenFrames(entry.pageState.frame)) {
        if (frame.formState === null) continue;
        for (const [formId, controls] of frame.formState) {
            for (const control of controls) {
                rows.push([formId, control.name, control.type, JSON.stringify(control.values)]);
            }
        }
    }
    return rows;
}

export function navigationRow(entry: NavigationEntry, hasPageState: boolean): CsvCell[] {
    return [
        entry.index,
        entry.title,
        entry.url,
        entry.timestamp ? formatCsvDate(entry.timestamp.toDate()) : null,
        entry.transition ? formatTransition(entry.transition) : null,
        entry.referrerUrl,
        entry.searchTerms,
        entry.httpStatusCode,
        hasPageState ? 'yes' : 'no',
    ];
}

function hasFormState(entry: NavigationEntry): boolean {
    if (entry.pageState?.kind !== 'versioned') return false;
    for (const frame of flattenFrames(entry.pageState.frame)) {
        if (frame.formState !== null) return true;
    }
    return false;
}

/**
 * Decodes `data` and writes CSV files into `outDir`, which must not exist
 * yet. Files written before a decode error stay on disk.
 */
export async function exportSession(data: Uint8Array, outDir: string, options: SnssDecoderOptions = {}): Promise<ExportSummary> {
    const decoder = new SnssDecoder(data, options);
    const header = decoder.readHeader();

    await fs.mkdir(outDir);

    const tabFiles = new Map<number, FileHandle>();
    const summary: ExportSummary = { header, tabs: [], navigations: 0, pageStateFiles: [] };

    try {
        for (const { tabId, entry } of decoder.navigations()) {
            let tabFile = tabFiles.get(tabId);
            if (tabFile === undefined) {
                tabFile = await fs.open(path.join(outDir, tabFileName(tabId)), 'w');
                tabFiles.set(tabId, tabFile);
                summary.tabs.push(tabId);
                await tabFile.write(csvRow(TAB_CSV_HEADER));
            }

            const withFormState = hasFormState(entry);
            if (withFormState) {
                const fileName = pageStateFileName(tabId, entry.index);
                const body = csvRow(PAGE_STATE_CSV_HEADER) + pageStateRows(entry).map(csvRow).join('');
                await fs.writeFile(path.join(outDir, fileName), body, 'utf8');
                if (!summary.pageStateFiles.includes(fileName)) summary.pageStateFiles.push(fileName);
            }

            await tabFile.write(csvRow(navigationRow(entry, withFormState)));
            summary.navigations++;
        }
    } finally {
        await Promise.all(Array.from(tabFiles.values(), handle => handle.close()));
    }

    return summary;
}
