import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { findConfigFile, findWorkspaceRoot, getRulesDir, resolveWorkspaceRoot } from './resolver';

describe('resolver', () => {
    let tmpDir: string;

    before(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rules-lint-resolver-'));
    });

    after(async () => {
        await fs.remove(tmpDir).catch(() => {});
    });

    it('finds the nearest directory holding .windsurf', async () => {
        const ws = path.join(tmpDir, 'ws');
        const deep = path.join(ws, 'packages', 'app', 'src');
        await fs.ensureDir(path.join(ws, '.windsurf'));
        await fs.ensureDir(deep);

        assert.strictEqual(findWorkspaceRoot(deep), ws);
        assert.strictEqual(findWorkspaceRoot(ws), ws);
        assert.strictEqual(resolveWorkspaceRoot(deep), ws);
    });

    it('ignores a .windsurf file that is not a directory', async () => {
        const outer = path.join(tmpDir, 'outer');
        const inner = path.join(outer, 'inner');
        await fs.ensureDir(path.join(outer, '.windsurf'));
        await fs.outputFile(path.join(inner, '.windsurf'), '');

        assert.strictEqual(findWorkspaceRoot(inner), outer);
    });

    it('treats a config file as a workspace marker', async () => {
        const ws = path.join(tmpDir, 'configured');
        const nested = path.join(ws, 'docs');
        await fs.ensureDir(nested);
        await fs.writeJson(path.join(ws, 'rules-lint.config.json'), {});

        assert.strictEqual(findWorkspaceRoot(nested), ws);
        assert.strictEqual(findConfigFile(ws), path.join(ws, 'rules-lint.config.json'));
        assert.strictEqual(findConfigFile(nested), null);
    });

    it('builds the default rules directory', () => {
        assert.strictEqual(getRulesDir('/ws'), path.join('/ws', '.windsurf', 'rules'));
    });
});
