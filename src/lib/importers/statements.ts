import { basename, extname, join } from 'node:path';
import { getDocumentProxy } from 'unpdf';
import { InvalidInputError } from '../errors';
import { listDirectory, readBinaryFile, readTextFile } from '../loaders/files';
import type { TradeSide } from '../types';
import { detectSettlementSide } from './settlement';

// Statements come as the bank's PDF, or as text already extracted from it
const STATEMENT_EXTENSIONS = ['.pdf', '.txt'];

export interface StatementFile {
    path: string;
    side: TradeSide;
}

export interface StatementListing {
    statements: StatementFile[];
    skipped: string[]; // not a statement by name or extension
}

export async function listStatementFiles(directory: string): Promise<StatementListing> {
    const statements: StatementFile[] = [];
    const skipped: string[] = [];
    for (const name of (await listDirectory(directory)).sort()) {
        const path = join(directory, name);
        const ext = extname(name);
        const side = STATEMENT_EXTENSIONS.includes(ext.toLowerCase())
            ? detectSettlementSide(basename(name, ext))
            : null;
        if (side) {
            statements.push({ path, side });
        } else {
            skipped.push(path);
        }
    }
    return { statements, skipped };
}

/**
 * Text of the first page, one line per text item. The settlement details
 * are all on page one.
 */
export async function extractPdfText(data: Uint8Array, source = 'statement'): Promise<string> {
    const pdf = await getDocumentProxy(data).catch((e: unknown) => {
        throw new InvalidInputError(source, `not a readable PDF (${e instanceof Error ? e.message : String(e)})`);
    });
    try {
        const page = await pdf.getPage(1);
        const content = await page.getTextContent();
        return content.items
            .map(item => ('str' in item ? item.str : ''))
            .filter(text => text !== '')
            .join('\n');
    } finally {
        await pdf.destroy();
    }
}

export async function readStatementText(path: string): Promise<string> {
    if (extname(path).toLowerCase() === '.pdf') {
        return extractPdfText(await readBinaryFile(path), path);
    }
    return readTextFile(path);
}
