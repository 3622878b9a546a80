#!/usr/bin/env node
/**
 * CLI: SNSS Reader
 *
 * Usage:
 *   snss-reader export <input> <outDir>   per-tab CSV tables
 *   snss-reader commands <input>          raw command listing
 *   snss-reader tab-state <input>         tab snapshot as JSON
 */
import * as fs from 'node:fs/promises';
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import type { Platform, SnssDecoderOptions, SnssLogger } from './snss/types.js';
import { SnssDecoder } from './snss/session-file.js';
import { decodeTabStateBytes } from './snss/tab-state.js';
import { SnssError } from './snss/errors.js';
import { exportSession } from './export/session-export.js';

export interface GlobalArgs {
    platform: Platform;
    maxFrameDepth?: number;
    verbose: boolean;
}

export function consoleLogger(verbose: boolean): SnssLogger {
    return {
        debug: verbose ? (msg) => console.error(msg) : undefined,
        warn: (msg) => console.error(`WARNING: ${msg}`),
    };
}

export function decoderOptions(args: GlobalArgs): SnssDecoderOptions {
    return {
        platform: args.platform,
        limits: args.maxFrameDepth === undefined ? {} : { maxFrameDepth: args.maxFrameDepth },
        logger: consoleLogger(args.verbose),
    };
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof SnssError) return error.describe();
    if (error instanceof Error) return error.message;
    return String(error);
}

/** JSON.stringify replacer for decoded values. */
export function jsonReplacer(_key: string, value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
    if (value instanceof Map) return Object.fromEntries(value);
    return value;
}

function fail(error: unknown): void {
    console.error(getErrorMessage(error));
    process.exitCode = 1;
}

export async function handleExport(args: GlobalArgs & { input: string; outDir: string }): Promise<void> {
    try {
        const data = await fs.readFile(args.input);
        const summary = await exportSession(data, args.outDir, decoderOptions(args));
        console.log(
            `Exported ${summary.navigations} navigation(s) from ${summary.tabs.length} tab(s)`
            + `, ${summary.pageStateFiles.length} page state file(s) to ${args.outDir}`
        );
    } catch (error) {
        fail(error);
    }
}

export async function handleCommands(args: GlobalArgs & { input: string }): Promise<void> {
    try {
        const data = await fs.readFile(args.input);
        const decoder = new SnssDecoder(data, decoderOptions(args));
        const header = decoder.readHeader();
        console.log(`SNSS version ${header.version}${header.versionSupported ? '' : ' (unsupported)'}`);
        for (const command of decoder.commands()) {
            console.log(`${command.offset}\t${command.id}\t${command.length}`);
        }
    } catch (error) {
        fail(error);
    }
}

export async function handleTabState(args: GlobalArgs & { input: string }): Promise<void> {
    try {
        const data = await fs.readFile(args.input);
        const state = decodeTabStateBytes(data, decoderOptions(args));
        console.log(JSON.stringify(state, jsonReplacer, 2));
    } catch (error) {
        fail(error);
    }
}

type ParsedGlobals = { platform?: string; maxFrameDepth?: number; verbose?: boolean };

function globalArgs(argv: ParsedGlobals): GlobalArgs {
    return {
        platform: argv.platform === 'desktop' ? 'desktop' : 'mobile',
        maxFrameDepth: argv.maxFrameDepth,
        verbose: argv.verbose === true,
    };
}

export function buildParser(argv: string[]) {
    return yargs(argv)
        .scriptName('snss-reader')
        .option('platform', {
            type: 'string',
            choices: ['desktop', 'mobile'],
            default: 'mobile',
            describe: 'Platform whose page state quirks apply',
        })
        .option('max-frame-depth', {
            type: 'number',
            describe: 'Deepest frame nesting accepted in page state',
        })
        .option('verbose', {
            type: 'boolean',
            default: false,
            describe: 'Log skipped and decoded commands to stderr',
        })
        .command(
            'export <input> <outDir>',
            'Writes per-tab navigation CSV files into a new directory.',
            (y) => y
                .positional('input', { type: 'string', demandOption: true, describe: 'SNSS file (Current/Last Tabs/Session)' })
                .positional('outDir', { type: 'string', demandOption: true, describe: 'Output directory (must not exist)' }),
            (args) => handleExport({ ...globalArgs(args), input: args.input, outDir: args.outDir })
        )
        .command(
            'commands <input>',
            'Lists the raw commands of an SNSS file (offset, id, length).',
            (y) => y.positional('input', { type: 'string', demandOption: true }),
            (args) => handleCommands({ ...globalArgs(args), input: args.input })
        )
        .command(
            'tab-state <input>',
            'Decodes a tab state pickle and prints it as JSON.',
            (y) => y.positional('input', { type: 'string', demandOption: true }),
            (args) => handleTabState({ ...globalArgs(args), input: args.input })
        )
        .demandCommand(1)
        .strict()
        .help();
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
    await buildParser(argv).parseAsync();
}

/** True when this module is the script node was started with (bin links resolved). */
function isEntryPoint(): boolean {
    const script = process.argv[1];
    if (script === undefined || !existsSync(script)) return false;
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
    main().catch(fail);
}
