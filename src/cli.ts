#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigLoader } from './core/config';
import { LintError, logError } from './core/errors';
import { ConsoleLogger, LintLogger } from './core/logger';
import { formatJsonReport, formatSummary } from './core/report';
import { resolveWorkspaceRoot } from './core/resolver';
import { ExitStatus, ReadErrorPolicy } from './core/types';
import { Validator } from './core/validator';

interface CliOptions {
    rulesDir?: string;
    extension?: string;
    maxLength?: number;
    marker?: string[];
    format: 'text' | 'json';
    onReadError?: ReadErrorPolicy;
    config?: string;
    verbose?: boolean;
}

const PackageSchema = z.object({ version: z.string() });

function getPackageVersion(): string {
    // From dist/cli.js or src/cli.ts, go up to package root
    const pkg = PackageSchema.safeParse(fs.readJsonSync(path.join(__dirname, '..', 'package.json'), { throws: false }));
    return pkg.success ? pkg.data.version : '0.0.0';
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function collect(value: string, previous: string[] | undefined): string[] {
    return [...(previous ?? []), value];
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM
// ═══════════════════════════════════════════════════════════════════════════

function buildProgram(logger: LintLogger, onStatus: (status: ExitStatus) => void): Command {
    const program = new Command();

    program
        .name('rules-lint')
        .description('Check workspace rule files for length and activation markers')
        .version(getPackageVersion())
        .argument('[root]', 'workspace root (default: nearest directory with .windsurf/)')
        .option('--rules-dir <dir>', 'rules directory, relative to the root')
        .option('--extension <ext>', 'rule file suffix')
        .option('--max-length <n>', 'maximum characters per rule file', parsePositiveInt)
        .option('--marker <text>', 'activation marker (repeatable, replaces the defaults)', collect)
        .addOption(new Option('--format <format>', 'output format').choices(['text', 'json']).default('text'))
        .addOption(new Option('--on-read-error <policy>', 'unreadable files').choices(['report', 'abort']))
        .option('--config <file>', 'config file (default: rules-lint.config.jsonc or .json in the root)')
        .option('--verbose', 'print a summary line')
        .exitOverride()
        .configureOutput({
            writeOut: (str) => logger.info(str.trimEnd()),
            writeErr: (str) => logger.error(str.trimEnd())
        })
        .action(async (root: string | undefined, opts: CliOptions) => {
            const workspaceRoot = root !== undefined ? path.resolve(root) : resolveWorkspaceRoot();
            const loader = new ConfigLoader(
                workspaceRoot,
                opts.config !== undefined ? path.resolve(opts.config) : undefined
            );

            const config = await loader.load({
                rulesDir: opts.rulesDir,
                extension: opts.extension,
                maxLength: opts.maxLength,
                markers: opts.marker,
                onReadError: opts.onReadError
            });

            const report = await new Validator(config, logger).run();

            if (opts.format === 'json') {
                logger.info(formatJsonReport(report));
            }
            if (opts.verbose) {
                logger.info(formatSummary(report));
            }

            onStatus(report.status);
        });

    return program;
}

/**
 * Parses argv, runs one validation pass and resolves with the exit status:
 * 0 clean, 1 violations, 2 usage, config or aborted read.
 */
export async function main(argv: string[], logger: LintLogger = new ConsoleLogger()): Promise<ExitStatus> {
    let status: ExitStatus = ExitStatus.OK;
    const program = buildProgram(logger, (s) => { status = s; });

    try {
        await program.parseAsync(argv);
    } catch (e: unknown) {
        if (e instanceof CommanderError) {
            // Help and version exit with 0; commander has already written the message
            return e.exitCode === 0 ? ExitStatus.OK : ExitStatus.ERROR;
        }
        if (e instanceof LintError) {
            logError(logger, e);
            return ExitStatus.ERROR;
        }
        throw e;
    }

    return status;
}

if (require.main === module) {
    main(process.argv).then(
        (status) => { process.exitCode = status; },
        (e: unknown) => {
            console.error('rules-lint fatal error:', e);
            process.exitCode = ExitStatus.ERROR;
        }
    );
}
