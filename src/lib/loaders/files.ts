import { readdir, readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import { InvalidInputError } from '../errors';

const errorCode = (e: unknown) => (e instanceof Error && 'code' in e ? String(e.code) : String(e));

export async function readTextFile(path: string): Promise<string> {
    try {
        return await readFile(path, 'utf8');
    } catch (e) {
        throw new InvalidInputError(path, `cannot read file (${errorCode(e)})`);
    }
}

export async function readBinaryFile(path: string): Promise<Uint8Array> {
    try {
        return new Uint8Array(await readFile(path));
    } catch (e) {
        throw new InvalidInputError(path, `cannot read file (${errorCode(e)})`);
    }
}

export async function listDirectory(path: string): Promise<string[]> {
    try {
        return await readdir(path);
    } catch (e) {
        throw new InvalidInputError(path, `cannot read directory (${errorCode(e)})`);
    }
}

export async function readJsonFile(path: string): Promise<unknown> {
    const text = await readTextFile(path);
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new InvalidInputError(path, `not valid JSON (${e instanceof Error ? e.message : String(e)})`);
    }
}

// First zod issue as "<path>: <message>"
export function describeZodError(error: ZodError): string {
    const issue = error.issues[0];
    if (!issue) return 'invalid content';
    const at = issue.path.join('.');
    return at ? `${at}: ${issue.message}` : issue.message;
}
