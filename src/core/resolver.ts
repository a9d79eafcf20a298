import fs from 'fs-extra';
import path from 'path';
import os from 'os';

export const WORKSPACE_MARKER = '.windsurf';

export const CONFIG_FILENAMES = ['rules-lint.config.jsonc', 'rules-lint.config.json'] as const;

function isWorkspaceRoot(dir: string): boolean {
    const markerPath = path.join(dir, WORKSPACE_MARKER);
    if (fs.existsSync(markerPath) && fs.statSync(markerPath).isDirectory()) {
        return true;
    }
    return CONFIG_FILENAMES.some(name => fs.existsSync(path.join(dir, name)));
}

/**
 * Find the workspace root by walking up the directory tree
 * Similar to how git finds .git
 */
export function findWorkspaceRoot(startDir: string = process.cwd()): string | null {
    let current = path.resolve(startDir);
    const root = path.parse(current).root;
    const home = os.homedir();

    while (current !== root && current !== home) {
        if (isWorkspaceRoot(current)) {
            return current;
        }
        current = path.dirname(current);
    }

    // Check root and home as final options
    for (const dir of [root, home]) {
        if (isWorkspaceRoot(dir)) {
            return dir;
        }
    }

    return null;
}

/**
 * Workspace root, or startDir itself when nothing marks one
 */
export function resolveWorkspaceRoot(startDir: string = process.cwd()): string {
    return findWorkspaceRoot(startDir) ?? path.resolve(startDir);
}

/**
 * Get the default rules directory path
 */
export function getRulesDir(workspaceRoot: string): string {
    return path.join(workspaceRoot, WORKSPACE_MARKER, 'rules');
}

/**
 * Get the config file path (.jsonc preferred), or null when neither exists
 */
export function findConfigFile(workspaceRoot: string): string | null {
    for (const name of CONFIG_FILENAMES) {
        const candidate = path.join(workspaceRoot, name);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
    }
    return null;
}
