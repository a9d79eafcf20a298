import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { decodeUtf8, normalizeNewlines, readRuleFile } from './io';

describe('decodeUtf8', () => {
    it('keeps a leading BOM as a character', () => {
        assert.strictEqual(decodeUtf8(Buffer.from([0xef, 0xbb, 0xbf, 0x61])), '\ufeffa');
    });

    it('returns null for malformed input', () => {
        assert.strictEqual(decodeUtf8(Buffer.from([0x61, 0xff, 0xfe])), null);
    });
});

describe('normalizeNewlines', () => {
    it('turns CRLF and lone CR into LF', () => {
        assert.strictEqual(normalizeNewlines('a\r\nb\rc\nd'), 'a\nb\nc\nd');
        assert.strictEqual(normalizeNewlines('\r\r\n'), '\n\n');
    });
});

describe('readRuleFile', () => {
    let tmpDir: string;

    before(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rules-lint-io-'));
    });

    after(async () => {
        await fs.remove(tmpDir).catch(() => {});
    });

    it('reads content and counts characters', async () => {
        const filePath = path.join(tmpDir, 'ok.md');
        await fs.writeFile(filePath, 'héllo 😀', 'utf-8');

        const result = await readRuleFile(filePath);
        assert.deepStrictEqual(result, {
            ok: true,
            file: { path: filePath, content: 'héllo 😀', length: 7 }
        });
    });

    it('counts a lone CR as a newline', async () => {
        const filePath = path.join(tmpDir, 'cr.md');
        await fs.writeFile(filePath, 'Manual\rab\r\n', 'utf-8');

        const result = await readRuleFile(filePath);
        assert.deepStrictEqual(result, {
            ok: true,
            file: { path: filePath, content: 'Manual\nab\n', length: 10 }
        });
    });

    it('reports invalid UTF-8', async () => {
        const filePath = path.join(tmpDir, 'bad.md');
        await fs.writeFile(filePath, Buffer.from([0x4d, 0x61, 0xc3, 0x28]));

        const result = await readRuleFile(filePath);
        assert.deepStrictEqual(result, { ok: false, path: filePath, reason: 'invalid UTF-8' });
    });

    it('reports the error code of a failed read', async () => {
        const filePath = path.join(tmpDir, 'missing.md');

        const result = await readRuleFile(filePath);
        assert.deepStrictEqual(result, { ok: false, path: filePath, reason: 'ENOENT' });
    });
});
