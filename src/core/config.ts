import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { findConfigFile, getRulesDir } from './resolver';
import { DEFAULT_MARKERS, DEFAULT_MAX_LENGTH } from './rules';
import { LintConfig } from './types';

export const LintOptionsSchema = z.object({
    rulesDir: z.string().min(1).describe('Rules directory, relative to the workspace root'),
    extension: z.string().min(1).describe('File name suffix of rule files, e.g. ".md"'),
    maxLength: z.number().int().positive().describe('Maximum rule length in characters'),
    markers: z.array(z.string().min(1)).min(1).describe('Activation markers, matched case-insensitively'),
    onReadError: z.enum(['report', 'abort']).describe('What to do when a rule file cannot be read')
}).strict();

export type LintOptions = Partial<z.infer<typeof LintOptionsSchema>>;

const PartialOptionsSchema = LintOptionsSchema.partial();

const DEFAULT_OPTIONS: Omit<z.infer<typeof LintOptionsSchema>, 'rulesDir'> = {
    extension: '.md',
    maxLength: DEFAULT_MAX_LENGTH,
    markers: [...DEFAULT_MARKERS],
    onReadError: 'report'
};

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

export function parseOptions(input: unknown, configPath?: string): LintOptions {
    const result = PartialOptionsSchema.safeParse(input);
    if (!result.success) {
        const source = configPath ? `config ${configPath}` : 'options';
        throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, configPath);
    }
    return result.data;
}

/**
 * Defaults < file < overrides. rulesDir resolves against the workspace root.
 */
export function resolveConfig(
    workspaceRoot: string,
    fileOptions: LintOptions = {},
    overrides: LintOptions = {}
): LintConfig {
    const rulesDir = overrides.rulesDir ?? fileOptions.rulesDir;

    return {
        rulesDir: rulesDir !== undefined
            ? path.resolve(workspaceRoot, rulesDir)
            : path.resolve(getRulesDir(workspaceRoot)),
        extension: overrides.extension ?? fileOptions.extension ?? DEFAULT_OPTIONS.extension,
        maxLength: overrides.maxLength ?? fileOptions.maxLength ?? DEFAULT_OPTIONS.maxLength,
        markers: overrides.markers ?? fileOptions.markers ?? [...DEFAULT_OPTIONS.markers],
        onReadError: overrides.onReadError ?? fileOptions.onReadError ?? DEFAULT_OPTIONS.onReadError
    };
}

export class ConfigLoader {
    private configPath: string | null;
    private explicit: boolean;
    private workDir: string;

    constructor(workDir: string, configPath?: string) {
        this.workDir = workDir;
        this.explicit = configPath !== undefined;
        this.configPath = configPath !== undefined
            ? path.resolve(workDir, configPath)
            : findConfigFile(workDir);
    }

    getConfigPath(): string | null {
        return this.configPath;
    }

    async loadFile(): Promise<LintOptions> {
        if (this.configPath === null) {
            return {};
        }

        if (!await fs.pathExists(this.configPath)) {
            if (this.explicit) {
                throw new ConfigError(`Config file not found: ${this.configPath}`);
            }
            return {};
        }

        const content = this.stripJsonComments(await fs.readFile(this.configPath, 'utf-8'));

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(`Invalid config JSON: ${reason}`, this.configPath);
        }

        return parseOptions(raw, this.configPath);
    }

    async load(overrides: LintOptions = {}): Promise<LintConfig> {
        const fileOptions = await this.loadFile();
        return resolveConfig(this.workDir, fileOptions, parseOptions(overrides));
    }

    // Full-line comments only, so "//" inside string values survives
    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}
