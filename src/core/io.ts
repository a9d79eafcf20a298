/**
 * CORE: Rule file reads
 * Strict UTF-8: malformed input is a read failure, never silently replaced.
 */

import fs from 'fs-extra';
import { TextDecoder } from 'util';
import { isErrnoException } from './errors';
import { countCharacters } from './rules';
import { RuleFile } from './types';

export type ReadResult =
    | { ok: true; file: RuleFile }
    | { ok: false; path: string; reason: string };

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function decodeUtf8(buffer: Uint8Array): string | null {
    try {
        return decoder.decode(buffer);
    } catch {
        return null;
    }
}

/** CRLF and lone CR become LF, as a text-mode read would */
export function normalizeNewlines(content: string): string {
    return content.replace(/\r\n?/g, '\n');
}

export async function readRuleFile(filePath: string): Promise<ReadResult> {
    let buffer: Buffer;
    try {
        buffer = await fs.readFile(filePath);
    } catch (err) {
        if (isErrnoException(err) && err.code) {
            return { ok: false, path: filePath, reason: err.code };
        }
        throw err;
    }

    const decoded = decodeUtf8(buffer);
    if (decoded === null) {
        return { ok: false, path: filePath, reason: 'invalid UTF-8' };
    }

    const content = normalizeNewlines(decoded);
    return {
        ok: true,
        file: { path: filePath, content, length: countCharacters(content) }
    };
}
