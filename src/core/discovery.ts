import type { Dirent } from 'fs';
import fs from 'fs-extra';
import path from 'path';
import { isErrnoException } from './errors';

export type DiscoveredEntry =
    | { type: 'file'; path: string }
    | { type: 'unreadable-dir'; path: string; reason: string };

/**
 * Recursively list files under rulesDir whose name ends with extension.
 * Depth-first, entries sorted by name within each directory.
 * A missing or non-directory rulesDir yields an empty list.
 *
 * A directory that cannot be listed becomes an 'unreadable-dir' entry in
 * place of its contents; the walk carries on with its siblings.
 */
export async function discoverRuleFiles(rulesDir: string, extension: string): Promise<DiscoveredEntry[]> {
    if (!await fs.pathExists(rulesDir)) {
        return [];
    }

    const stats = await fs.stat(rulesDir);
    if (!stats.isDirectory()) {
        return [];
    }

    const found: DiscoveredEntry[] = [];
    await walk(path.resolve(rulesDir), extension, found);
    return found;
}

async function walk(dir: string, extension: string, found: DiscoveredEntry[]): Promise<void> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
        if (isErrnoException(err) && err.code) {
            found.push({ type: 'unreadable-dir', path: dir, reason: err.code });
            return;
        }
        throw err;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
            await walk(entryPath, extension, found);
            continue;
        }

        // Symlinks to files are linted; symlinked directories are not followed
        if (!entry.name.endsWith(extension)) continue;
        if (entry.isFile() || (entry.isSymbolicLink() && await isFileTarget(entryPath))) {
            found.push({ type: 'file', path: entryPath });
        }
    }
}

async function isFileTarget(linkPath: string): Promise<boolean> {
    try {
        return (await fs.stat(linkPath)).isFile();
    } catch (err) {
        // Dangling or looping link: keep it so the read failure gets reported
        if (isErrnoException(err)) return true;
        throw err;
    }
}
